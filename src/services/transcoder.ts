import { execFile } from 'child_process';
import { promisify } from 'util';
import { TRANSCODE_TIMEOUT_MS } from '../constants';

const execFileAsync = promisify(execFile);

/** Converts a local media file into a streamable MP4. Rejects on any failure. */
export interface Transcoder {
	transcode(inputPath: string, outputPath: string): Promise<void>;
}

export function buildFfmpegArgs(inputPath: string, outputPath: string): string[] {
	return [
		'-hide_banner',
		'-loglevel', 'error',
		'-y',
		'-i', inputPath,
		'-c:v', 'libx264',
		'-preset', 'veryfast',
		'-pix_fmt', 'yuv420p',
		// libx264 needs even dimensions
		'-vf', 'scale=trunc(iw/2)*2:trunc(ih/2)*2',
		'-c:a', 'aac',
		'-movflags', '+faststart',
		outputPath,
	];
}

export class FfmpegTranscoder implements Transcoder {
	constructor(
		private readonly ffmpegPath = 'ffmpeg',
		private readonly timeoutMs = TRANSCODE_TIMEOUT_MS
	) {}

	async transcode(inputPath: string, outputPath: string): Promise<void> {
		await execFileAsync(this.ffmpegPath, buildFfmpegArgs(inputPath, outputPath), {
			timeout: this.timeoutMs,
			maxBuffer: 10 * 1024 * 1024,
		});
	}
}
