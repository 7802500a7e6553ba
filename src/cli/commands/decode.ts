import ora from 'ora';
import { imageToFile } from '../../convert/index.js';
import { DecodeOptionsSchema, defaultDecodeOutput, describeIssues } from '../../config/index.js';
import { formatBytes, formatDimensions } from '../format.js';
import { reportFailure } from '../report.js';
import type { Logger } from '../logger.js';

export async function decodeCommand(
  image: string,
  output: string | undefined,
  flags: { force?: boolean },
  logger: Logger
): Promise<boolean> {
  const parsed = DecodeOptionsSchema.safeParse({
    image,
    output: output ?? defaultDecodeOutput(image),
    force: flags.force,
  });
  if (!parsed.success) {
    logger.error(describeIssues(parsed.error));
    return false;
  }

  const options = parsed.data;
  logger.debug(`decode ${options.image} -> ${options.output}`);

  const spinner = ora({
    text: 'Recovering file from image...',
    isSilent: logger.level !== 'info' && logger.level !== 'debug',
  }).start();

  const result = await imageToFile(options.image, options.output, { overwrite: options.force });
  if (!result.ok) {
    spinner.fail('Decoding failed');
    reportFailure(logger, result.error);
    return false;
  }

  spinner.succeed('Decoded');
  logger.success(`File written to ${result.value.outputPath}`);
  logger.detail(`Image: ${formatDimensions(result.value.width, result.value.height)}`);
  logger.detail(`Payload: ${formatBytes(result.value.payloadBytes)}`);
  return true;
}
