import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { DeliverablePayload } from '../types/dispatch';
import type { Transcoder } from './transcoder';
import { ConversionError, MediaNormalizer } from './media-normalizer';

class FakeTranscoder implements Transcoder {
	readonly calls: Array<{ inputPath: string; outputPath: string; input: string }> = [];

	constructor(private readonly failure?: Error) {}

	async transcode(inputPath: string, outputPath: string): Promise<void> {
		this.calls.push({ inputPath, outputPath, input: await readFile(inputPath, 'utf8') });
		if (this.failure) throw this.failure;
		await writeFile(outputPath, 'mp4-bytes');
	}
}

const WEBM = { url: 'https://static1.e621.net/data/12/34/1234.webm', ext: 'webm', size: 9 };
const MP4 = { url: 'https://static1.e621.net/data/56/78/5678.mp4', ext: 'mp4', size: 9 };

describe('MediaNormalizer', () => {
	let tmpRoot: string;
	let fetchMock: Mock<(url: string, init?: RequestInit) => Promise<Response>>;

	beforeEach(async () => {
		tmpRoot = await mkdtemp(join(tmpdir(), 'normalizer-test-'));
		fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('webm-data'));
		vi.stubGlobal('fetch', fetchMock);
	});

	afterEach(async () => {
		vi.unstubAllGlobals();
		await rm(tmpRoot, { recursive: true, force: true });
	});

	const create = (transcoder: Transcoder) => new MediaNormalizer(transcoder, { userAgent: 'test-agent', tmpRoot });

	it('only converts webm, regardless of case', () => {
		const normalizer = create(new FakeTranscoder());

		expect(normalizer.requiresConversion({ ext: 'webm' })).toBe(true);
		expect(normalizer.requiresConversion({ ext: 'WEBM' })).toBe(true);
		expect(normalizer.requiresConversion({ ext: 'mp4' })).toBe(false);
		expect(normalizer.requiresConversion({ ext: 'gif' })).toBe(false);
	});

	it('passes streamable media through by URL without downloading', async () => {
		const transcoder = new FakeTranscoder();

		const result = await create(transcoder).withDeliverable(5678, MP4, async (payload) => payload);

		expect(result).toEqual({ ok: true, value: { kind: 'url', url: MP4.url } });
		expect(fetchMock).not.toHaveBeenCalled();
		expect(transcoder.calls).toHaveLength(0);
	});

	it('downloads and transcodes webm, exposing the MP4 only while in use', async () => {
		const transcoder = new FakeTranscoder();
		let seen: DeliverablePayload | undefined;

		const result = await create(transcoder).withDeliverable(1234, WEBM, async (payload) => {
			seen = payload;
			return payload.kind === 'file' ? readFile(payload.path, 'utf8') : 'not-a-file';
		});

		expect(result).toEqual({ ok: true, value: 'mp4-bytes' });
		expect(seen).toMatchObject({ kind: 'file', filename: '1234.mp4' });
		expect(transcoder.calls).toHaveLength(1);
		expect(transcoder.calls[0].input).toBe('webm-data');
		expect(transcoder.calls[0].outputPath.endsWith('1234.mp4')).toBe(true);
		expect(fetchMock).toHaveBeenCalledWith(WEBM.url, expect.objectContaining({ headers: { 'User-Agent': 'test-agent' } }));
		expect(await readdir(tmpRoot)).toEqual([]);
	});

	it('returns a ConversionError and cleans up when the transcoder fails', async () => {
		const use = vi.fn(async () => 'sent');

		const result = await create(new FakeTranscoder(new Error('ffmpeg exited with code 1'))).withDeliverable(1234, WEBM, use);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(ConversionError);
		expect(result.error.message).toBe('Transcoding failed: ffmpeg exited with code 1');
		expect(use).not.toHaveBeenCalled();
		expect(await readdir(tmpRoot)).toEqual([]);
	});

	it('returns a ConversionError when the download fails', async () => {
		fetchMock.mockImplementation(async () => new Response(null, { status: 404 }));
		const transcoder = new FakeTranscoder();

		const result = await create(transcoder).withDeliverable(1234, WEBM, async () => 'sent');

		expect(!result.ok && result.error.message).toBe('Download failed: HTTP 404');
		expect(transcoder.calls).toHaveLength(0);
		expect(await readdir(tmpRoot)).toEqual([]);
	});

	it('refuses files above the upload limit without downloading them', async () => {
		const result = await create(new FakeTranscoder()).withDeliverable(
			1234,
			{ ...WEBM, size: 60 * 1024 * 1024 },
			async () => 'sent'
		);

		expect(!result.ok && result.error.message).toBe('File too large (60.0MB) — Telegram limit is 50MB');
		expect(fetchMock).not.toHaveBeenCalled();
		expect(await readdir(tmpRoot)).toEqual([]);
	});

	it('removes the working directory when the consumer throws', async () => {
		const normalizer = create(new FakeTranscoder());

		await expect(
			normalizer.withDeliverable(1234, WEBM, async () => {
				throw new Error('consumer blew up');
			})
		).rejects.toThrow('consumer blew up');
		expect(await readdir(tmpRoot)).toEqual([]);
	});

	it('returns a ConversionError when the temporary directory cannot be created', async () => {
		const use = vi.fn(async () => 'sent');
		const normalizer = new MediaNormalizer(new FakeTranscoder(), {
			userAgent: 'test-agent',
			tmpRoot: join(tmpRoot, 'missing', 'nested'),
		});

		const result = await normalizer.withDeliverable(1234, WEBM, use);

		expect(result.ok).toBe(false);
		expect(!result.ok && result.error).toBeInstanceOf(ConversionError);
		expect(!result.ok && result.error.message).toMatch(/^Could not create a temporary directory: ENOENT/);
		expect(use).not.toHaveBeenCalled();
		expect(fetchMock).not.toHaveBeenCalled();
	});
});
