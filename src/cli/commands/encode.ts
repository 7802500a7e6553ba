import ora from 'ora';
import { fileToImage } from '../../convert/index.js';
import { EncodeOptionsSchema, defaultEncodeOutput, describeIssues } from '../../config/index.js';
import { formatBytes, formatDimensions } from '../format.js';
import { reportFailure } from '../report.js';
import type { Logger } from '../logger.js';

export async function encodeCommand(
  input: string,
  output: string | undefined,
  flags: { force?: boolean },
  logger: Logger
): Promise<boolean> {
  const parsed = EncodeOptionsSchema.safeParse({
    input,
    output: output ?? defaultEncodeOutput(input),
    force: flags.force,
  });
  if (!parsed.success) {
    logger.error(describeIssues(parsed.error));
    return false;
  }

  const options = parsed.data;
  logger.debug(`encode ${options.input} -> ${options.output}`);

  const spinner = ora({
    text: 'Encoding file into image...',
    isSilent: logger.level !== 'info' && logger.level !== 'debug',
  }).start();

  const result = await fileToImage(options.input, options.output, { overwrite: options.force });
  if (!result.ok) {
    spinner.fail('Encoding failed');
    reportFailure(logger, result.error);
    return false;
  }

  spinner.succeed('Encoded');
  const { payloadBytes, imageBytes, layout } = result.value;

  logger.success(`Image written to ${result.value.outputPath}`);
  logger.detail(`Payload: ${formatBytes(payloadBytes)}`);
  logger.detail(`Dimensions: ${formatDimensions(layout.width, layout.height)}`);
  logger.detail(`Padding: ${layout.padding} B`);
  logger.detail(`Image size: ${formatBytes(imageBytes)}`);
  return true;
}
