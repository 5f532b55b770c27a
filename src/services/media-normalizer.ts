import { mkdtemp, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { MediaRef } from '../types/post';
import type { DeliverablePayload } from '../types/dispatch';
import type { Transcoder } from './transcoder';
import {
	APP_NAME,
	CONVERTIBLE_EXTENSIONS,
	DOWNLOAD_TIMEOUT_MS,
	MAX_UPLOAD_SIZE,
	TRANSCODED_EXTENSION,
} from '../constants';
import logger, { errorMessage } from '../utils/logger';

export class ConversionError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'ConversionError';
	}
}

export type ResolvedMedia = Readonly<MediaRef> & { readonly url: string };

export type NormalizeResult<T> = { ok: true; value: T } | { ok: false; error: ConversionError };

export interface MediaNormalizerOptions {
	userAgent: string;
	/** Parent directory for per-post working directories. Defaults to the OS temp dir. */
	tmpRoot?: string;
	downloadTimeoutMs?: number;
	maxUploadSize?: number;
}

export class MediaNormalizer {
	private readonly tmpRoot: string;
	private readonly downloadTimeoutMs: number;
	private readonly maxUploadSize: number;

	constructor(
		private readonly transcoder: Transcoder,
		private readonly options: MediaNormalizerOptions
	) {
		this.tmpRoot = options.tmpRoot ?? tmpdir();
		this.downloadTimeoutMs = options.downloadTimeoutMs ?? DOWNLOAD_TIMEOUT_MS;
		this.maxUploadSize = options.maxUploadSize ?? MAX_UPLOAD_SIZE;
	}

	requiresConversion(media: Pick<MediaRef, 'ext'>): boolean {
		return CONVERTIBLE_EXTENSIONS.has(media.ext.toLowerCase());
	}

	/**
	 * Resolve the payload Telegram should receive and hand it to `use`.
	 *
	 * Media Telegram can stream is passed through as its URL, without downloading. Anything else
	 * is downloaded and transcoded inside a private working directory that only lives for the
	 * duration of `use`; it is removed on every exit path, including when `use` throws.
	 * `use` is not called when conversion fails.
	 */
	async withDeliverable<T>(
		postId: number,
		media: ResolvedMedia,
		use: (payload: DeliverablePayload) => Promise<T>
	): Promise<NormalizeResult<T>> {
		if (!this.requiresConversion(media)) {
			return { ok: true, value: await use({ kind: 'url', url: media.url }) };
		}

		if (media.size > this.maxUploadSize) {
			return { ok: false, error: new ConversionError(`File too large (${formatMegabytes(media.size)}MB) — Telegram limit is 50MB`) };
		}

		let workDir: string;
		try {
			workDir = await mkdtemp(join(this.tmpRoot, `${APP_NAME}-${postId}-`));
		} catch (err) {
			return {
				ok: false,
				error: new ConversionError(`Could not create a temporary directory: ${errorMessage(err)}`, { cause: err }),
			};
		}

		try {
			const sourcePath = join(workDir, `source.${media.ext.toLowerCase()}`);
			const outputPath = join(workDir, `${postId}.${TRANSCODED_EXTENSION}`);

			try {
				await this.download(media.url, sourcePath);
			} catch (err) {
				return { ok: false, error: new ConversionError(`Download failed: ${errorMessage(err)}`, { cause: err }) };
			}

			let outputSize: number;
			try {
				await this.transcoder.transcode(sourcePath, outputPath);
				outputSize = (await stat(outputPath)).size;
			} catch (err) {
				return { ok: false, error: new ConversionError(`Transcoding failed: ${errorMessage(err)}`, { cause: err }) };
			}

			if (outputSize > this.maxUploadSize) {
				return { ok: false, error: new ConversionError(`Transcoded file too large (${formatMegabytes(outputSize)}MB)`) };
			}

			logger.debug(`[Media] Transcoded post ${postId} to ${TRANSCODED_EXTENSION}`, { bytes: outputSize });
			const filename = `${postId}.${TRANSCODED_EXTENSION}`;
			return { ok: true, value: await use({ kind: 'file', path: outputPath, filename }) };
		} finally {
			await rm(workDir, { recursive: true, force: true });
		}
	}

	private async download(url: string, destination: string): Promise<void> {
		const resp = await fetch(url, {
			headers: { 'User-Agent': this.options.userAgent },
			signal: AbortSignal.timeout(this.downloadTimeoutMs),
		});
		if (!resp.ok) throw new Error(`HTTP ${resp.status}`);

		const contentLength = Number(resp.headers.get('content-length') || 0);
		if (contentLength > this.maxUploadSize) {
			throw new Error(`File too large (${formatMegabytes(contentLength)}MB)`);
		}

		const bytes = new Uint8Array(await resp.arrayBuffer());
		if (bytes.length > this.maxUploadSize) {
			throw new Error(`File too large (${formatMegabytes(bytes.length)}MB)`);
		}

		await writeFile(destination, bytes);
	}
}

function formatMegabytes(bytes: number): string {
	return (bytes / 1024 / 1024).toFixed(1);
}
