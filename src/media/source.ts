import { existsSync } from 'fs';
import { ValidationError, errorMessage } from '../errors.js';
import type { SourceMedia } from '../pipeline/types.js';
import { hashFile } from '../utils/hash.js';
import { probeMedia, type MediaProbe, type MediaToolchain } from './ffmpeg.js';

/**
 * Probe and fingerprint the batch source. Anything that is not a readable
 * video with a duration is a ValidationError: nothing can be encoded from it.
 */
export async function loadSource(
  toolchain: MediaToolchain,
  filePath: string,
  timeoutMs: number,
): Promise<SourceMedia> {
  if (!existsSync(filePath)) {
    throw new ValidationError([`source: file not found: ${filePath}`]);
  }

  let probe: MediaProbe;
  try {
    probe = await probeMedia(toolchain, filePath, timeoutMs);
  } catch (err) {
    throw new ValidationError([`source: not a readable media file (${errorMessage(err)})`]);
  }

  if (!probe.hasVideo || probe.width <= 0 || probe.height <= 0) {
    throw new ValidationError(['source: no video stream']);
  }
  // Variants are encoded as yuv420p at the source size.
  if (probe.width % 2 !== 0 || probe.height % 2 !== 0) {
    throw new ValidationError([`source: ${probe.width}x${probe.height} has an odd dimension, width and height must be even`]);
  }
  if (probe.durationSec <= 0) {
    throw new ValidationError(['source: duration could not be determined']);
  }

  return {
    path:        filePath,
    format:      probe.formatName,
    durationSec: probe.durationSec,
    width:       probe.width,
    height:      probe.height,
    bitRateKbps: probe.bitRateKbps,
    hasAudio:    probe.hasAudio,
    sampleRate:  probe.sampleRate,
    checksum:    await hashFile(filePath),
  };
}
