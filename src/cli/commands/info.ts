import { inspectImage } from '../../convert/index.js';
import { InspectOptionsSchema, describeIssues } from '../../config/index.js';
import { formatBytes, formatDimensions } from '../format.js';
import { reportFailure } from '../report.js';
import type { Logger } from '../logger.js';

export async function infoCommand(image: string, logger: Logger): Promise<boolean> {
  const parsed = InspectOptionsSchema.safeParse({ image });
  if (!parsed.success) {
    logger.error(describeIssues(parsed.error));
    return false;
  }

  const result = await inspectImage(parsed.data.image);
  if (!result.ok) {
    reportFailure(logger, result.error);
    return false;
  }

  const report = result.value;
  logger.info(report.imagePath);
  logger.detail(`Dimensions: ${formatDimensions(report.width, report.height)}`);
  logger.detail(`Capacity: ${formatBytes(report.capacity)}`);

  switch (report.status) {
    case 'ok':
      logger.detail(`Payload: ${report.declaredLength} B`);
      logger.detail(`Padding: ${report.padding} B`);
      logger.success('Payload header is consistent with the image size');
      return true;
    case 'truncated-payload':
      logger.detail(`Declared payload: ${report.declaredLength} B`);
      logger.warn('Declared payload is larger than the image can hold');
      return false;
    case 'truncated-header':
      logger.warn('Image is too small to hold a payload header');
      return false;
  }
}
