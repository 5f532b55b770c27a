import { GrammyError, HttpError, InputFile } from 'grammy';
import type { Api } from 'grammy';
import type { DeliverablePayload } from '../../types/dispatch';
import { errorMessage } from '../../utils/logger';

/**
 * rejected: Telegram refused the content itself (wrong type, unreadable URL); another
 *   delivery method may still succeed.
 * timeout: the request did not complete in time.
 * failed: anything else (network, permissions, rate limits).
 */
export type SendErrorKind = 'rejected' | 'timeout' | 'failed';

export class TransportError extends Error {
	constructor(
		message: string,
		public readonly kind: SendErrorKind,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = 'TransportError';
	}
}

export type SendResult = { ok: true } | { ok: false; error: TransportError };

export interface MessagingTransport {
	sendVideo(destination: string, payload: DeliverablePayload, caption: string): Promise<SendResult>;
	sendAnimation(destination: string, payload: DeliverablePayload, caption: string): Promise<SendResult>;
}

export type TelegramSendApi = Pick<Api, 'sendVideo' | 'sendAnimation'>;

// Bad Request descriptions Telegram returns when it cannot use the media as given
const REJECTED_CONTENT_PATTERNS = [
	/wrong type of the web page content/i,
	/failed to get HTTP URL content/i,
	/wrong file identifier\/HTTP URL specified/i,
	/VIDEO_CONTENT_TYPE_INVALID/,
	/WEBPAGE_MEDIA_EMPTY/,
	/WEBPAGE_CURL_FAILED/,
	/IMAGE_PROCESS_FAILED/,
];

export function classifySendError(err: unknown): TransportError {
	if (err instanceof TransportError) return err;

	if (err instanceof GrammyError) {
		const rejected =
			err.error_code === 413 ||
			(err.error_code === 400 && REJECTED_CONTENT_PATTERNS.some((pattern) => pattern.test(err.description)));
		return new TransportError(`${err.method}: ${err.description}`, rejected ? 'rejected' : 'failed', { cause: err });
	}

	if (err instanceof HttpError) {
		const timedOut = isAbort(err.error) || /timed out/i.test(err.message);
		return new TransportError(err.message, timedOut ? 'timeout' : 'failed', { cause: err });
	}

	return new TransportError(errorMessage(err), isAbort(err) ? 'timeout' : 'failed', { cause: err });
}

function isAbort(err: unknown): boolean {
	return (
		typeof err === 'object' &&
		err !== null &&
		'name' in err &&
		(err.name === 'AbortError' || err.name === 'TimeoutError')
	);
}

function toInputMedia(payload: DeliverablePayload): string | InputFile {
	return payload.kind === 'url' ? payload.url : new InputFile(payload.path, payload.filename);
}

/**
 * Telegram delivery with a hard per-request timeout. Errors come back classified rather than thrown.
 */
export class TelegramTransport implements MessagingTransport {
	constructor(
		private readonly api: TelegramSendApi,
		private readonly timeoutMs: number
	) {}

	sendVideo(destination: string, payload: DeliverablePayload, caption: string): Promise<SendResult> {
		return this.call(() =>
			this.api.sendVideo(
				destination,
				toInputMedia(payload),
				{ caption, parse_mode: 'HTML', supports_streaming: true },
				AbortSignal.timeout(this.timeoutMs)
			)
		);
	}

	sendAnimation(destination: string, payload: DeliverablePayload, caption: string): Promise<SendResult> {
		return this.call(() =>
			this.api.sendAnimation(
				destination,
				toInputMedia(payload),
				{ caption, parse_mode: 'HTML' },
				AbortSignal.timeout(this.timeoutMs)
			)
		);
	}

	private async call(send: () => Promise<unknown>): Promise<SendResult> {
		try {
			await send();
			return { ok: true };
		} catch (err) {
			return { ok: false, error: classifySendError(err) };
		}
	}
}
