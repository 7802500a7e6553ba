import type { ConvertFailure, ConvertFailureKind } from '../convert/index.js';
import type { Logger } from './logger.js';

const HINTS: Record<ConvertFailureKind, string | null> = {
  SourceUnavailable: 'Check that the path exists and is readable.',
  InvalidImage: 'Only 8-bit RGB or RGBA PNG images can be decoded.',
  TruncatedHeader: 'The image is too small to carry a bytepix payload.',
  TruncatedPayload: 'The image was not written by bytepix, or was altered after encoding.',
  DestinationExists: 'Pass --force to overwrite it.',
  WriteFailed: null,
};

export function reportFailure(logger: Logger, failure: ConvertFailure): void {
  logger.error(failure.message);
  const hint = HINTS[failure.kind];
  if (hint) {
    logger.detail(hint);
  }
}
