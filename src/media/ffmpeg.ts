/**
 * ffmpeg / ffprobe process plumbing: running the binaries with a timeout,
 * probing media files, listing compiled-in encoders and decode checks.
 *
 * Everything goes through a MediaToolchain so the encoder and its tests can
 * swap the real binaries for an in-process fake.
 */
import { execFile } from 'child_process';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ToolResult {
  stdout: string;
  stderr: string;
}

export interface ToolOptions {
  label: string;
  timeoutMs: number;
}

export interface MediaToolchain {
  ffmpeg(args: string[], opts: ToolOptions): Promise<ToolResult>;
  ffprobe(args: string[], opts: ToolOptions): Promise<ToolResult>;
}

export class ToolError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly timedOut: boolean,
    public readonly notFound: boolean,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = 'ToolError';
  }

  /** Last few stderr lines; ffmpeg prints the actual error at the end. */
  get stderrTail(): string {
    return this.stderr.trim().split('\n').slice(-10).join('\n').slice(0, 1_000);
  }
}

export interface MediaProbe {
  formatName: string;
  durationSec: number;
  width: number;
  height: number;
  bitRateKbps: number | null;
  hasVideo: boolean;
  hasAudio: boolean;
  sampleRate: number | null;
  tags: Record<string, string>;
}

// ── Process runner ────────────────────────────────────────────────────────────

const MAX_BUFFER = 32 * 1024 * 1024;

function runTool(bin: string, args: string[], opts: ToolOptions): Promise<ToolResult> {
  logger.debug(`${bin} [${opts.label}]`, { args: args.join(' ') });
  return new Promise((resolve, reject) => {
    execFile(
      bin,
      args,
      { timeout: opts.timeoutMs, killSignal: 'SIGKILL', maxBuffer: MAX_BUFFER, encoding: 'utf-8' },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr });
          return;
        }
        const notFound = err.code === 'ENOENT';
        const timedOut = err.killed === true && !notFound;
        const exitCode = typeof err.code === 'number' ? err.code : null;
        const reason = notFound ? 'binary not found'
          : timedOut ? `timed out after ${opts.timeoutMs}ms`
          : `exit code ${exitCode ?? err.signal ?? 'unknown'}`;
        reject(new ToolError(`${bin} ${opts.label} failed: ${reason}`, exitCode, timedOut, notFound, stderr));
      },
    );
  });
}

export const nodeToolchain: MediaToolchain = {
  ffmpeg:  (args, opts) => runTool('ffmpeg', ['-hide_banner', '-nostdin', '-y', ...args], opts),
  ffprobe: (args, opts) => runTool('ffprobe', ['-hide_banner', ...args], opts),
};

// ── Probing ───────────────────────────────────────────────────────────────────

const numeric = z.union([z.string(), z.number()]).optional()
  .transform(v => (v === undefined ? NaN : Number(v)));

const FfprobeSchema = z.object({
  streams: z.array(z.object({
    codec_type:  z.string(),
    width:       z.number().optional(),
    height:      z.number().optional(),
    sample_rate: numeric,
    duration:    numeric,
  })).default([]),
  format: z.object({
    format_name: z.string(),
    duration:    numeric,
    bit_rate:    numeric,
    tags:        z.record(z.string()).default({}),
  }),
});

/**
 * Probe a media file with ffprobe's JSON writer.
 * Throws ToolError when ffprobe cannot read the file.
 */
export async function probeMedia(
  toolchain: MediaToolchain,
  filePath: string,
  timeoutMs: number,
): Promise<MediaProbe> {
  const { stdout } = await toolchain.ffprobe(
    ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', filePath],
    { label: 'probeMedia', timeoutMs },
  );

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new ToolError('ffprobe probeMedia returned non-JSON output', 0, false, false, stdout);
  }

  const parsed = FfprobeSchema.safeParse(json);
  if (!parsed.success) {
    throw new ToolError(`ffprobe probeMedia output not understood: ${parsed.error.message}`, 0, false, false, stdout);
  }

  const { streams, format } = parsed.data;
  const video = streams.find(s => s.codec_type === 'video');
  const audio = streams.find(s => s.codec_type === 'audio');

  // Container duration is authoritative; fall back to the video stream's.
  const durationSec = Number.isFinite(format.duration) ? format.duration : (video?.duration ?? NaN);

  return {
    formatName:  format.format_name,
    durationSec: Number.isFinite(durationSec) ? durationSec : 0,
    width:       video?.width ?? 0,
    height:      video?.height ?? 0,
    bitRateKbps: Number.isFinite(format.bit_rate) ? Math.round(format.bit_rate / 1000) : null,
    hasVideo:    video !== undefined,
    hasAudio:    audio !== undefined,
    sampleRate:  audio && Number.isFinite(audio.sample_rate) ? audio.sample_rate : null,
    tags:        format.tags,
  };
}

/** Encoder names compiled into the local ffmpeg build. */
export async function listEncoders(toolchain: MediaToolchain, timeoutMs: number): Promise<Set<string>> {
  const { stdout } = await toolchain.ffmpeg(['-encoders'], { label: 'listEncoders', timeoutMs });
  const names = new Set<string>();
  for (const line of stdout.split('\n')) {
    // " V....D h264_nvenc           NVIDIA NVENC H.264 encoder"
    const m = /^\s*[VAS][A-Z.]{5}\s+(\w[\w-]*)/.exec(line);
    if (m?.[1]) names.add(m[1]);
  }
  return names;
}

/** Decode the last second of a file; truncated output fails here. */
export async function decodeTail(toolchain: MediaToolchain, filePath: string, timeoutMs: number): Promise<void> {
  await toolchain.ffmpeg(
    ['-v', 'error', '-sseof', '-1', '-i', filePath, '-f', 'null', '-'],
    { label: 'decodeTail', timeoutMs },
  );
}
