import { z } from 'zod';

export const LogLevel = z.enum(['silent', 'error', 'info', 'debug']);
export type LogLevelName = z.infer<typeof LogLevel>;

export const LOG_LEVEL_ENV = 'BYTEPIX_LOG_LEVEL';

// Paths are used exactly as typed; only an all-blank value is rejected
const filePath = z.string().refine((value) => value.trim().length > 0, { message: 'Path is required' });

// Only lossless output keeps every channel byte intact
const pngPath = filePath.refine(
  (value) => value.toLowerCase().endsWith('.png'),
  { message: 'Output image must be a .png file' }
);

export const EncodeOptionsSchema = z.object({
  input: filePath,
  output: pngPath,
  force: z.boolean().default(false),
});

export type EncodeOptions = z.infer<typeof EncodeOptionsSchema>;

export const DecodeOptionsSchema = z.object({
  image: filePath,
  output: filePath,
  force: z.boolean().default(false),
});

export type DecodeOptions = z.infer<typeof DecodeOptionsSchema>;

export const InspectOptionsSchema = z.object({
  image: filePath,
});

export type InspectOptions = z.infer<typeof InspectOptionsSchema>;

export type VerbosityFlags = {
  quiet?: boolean;
  verbose?: boolean;
};

/**
 * Flags win over the environment; an unrecognised env value falls back to info
 */
export function resolveLogLevel(
  flags: VerbosityFlags,
  env: NodeJS.ProcessEnv = process.env
): LogLevelName {
  if (flags.quiet) return 'error';
  if (flags.verbose) return 'debug';

  const parsed = LogLevel.safeParse(env[LOG_LEVEL_ENV]?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

export function defaultEncodeOutput(input: string): string {
  return `${input}.png`;
}

export function defaultDecodeOutput(image: string): string {
  return image.toLowerCase().endsWith('.png') && image.length > 4
    ? image.slice(0, -4)
    : `${image}.bin`;
}

/**
 * First validation message, for printing to the console
 */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid options';
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
}
