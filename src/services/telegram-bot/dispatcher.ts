import type { Post } from '../../types/post';
import type { DeliverablePayload, DeliveryMethod, DispatchOutcome } from '../../types/dispatch';
import type { MediaNormalizer } from '../media-normalizer';
import type { MessagingTransport, SendResult, TransportError } from './transport';
import { buildCaption } from '../../utils/telegram-format';
import logger, { errorMessage } from '../../utils/logger';

export interface DeliveryStrategy {
	method: DeliveryMethod;
	send(transport: MessagingTransport, destination: string, payload: DeliverablePayload, caption: string): Promise<SendResult>;
}

/** Tried in order; a strategy only runs when the previous one was rejected for its content. */
export const DELIVERY_STRATEGIES: readonly DeliveryStrategy[] = [
	{ method: 'video', send: (transport, destination, payload, caption) => transport.sendVideo(destination, payload, caption) },
	{ method: 'animation', send: (transport, destination, payload, caption) => transport.sendAnimation(destination, payload, caption) },
];

export class Dispatcher {
	constructor(
		private readonly transport: MessagingTransport,
		private readonly normalizer: Pick<MediaNormalizer, 'withDeliverable'>,
		private readonly strategies: readonly DeliveryStrategy[] = DELIVERY_STRATEGIES
	) {}

	/**
	 * Deliver one post that already passed the blacklist. Never throws: every failure is
	 * reported as an outcome so the caller can move on to the next post.
	 */
	async dispatch(post: Post, destination: string): Promise<DispatchOutcome> {
		const { url } = post.media;
		if (url === null) {
			logger.warn(`[Dispatch] Post ${post.id} has no file URL, skipping`);
			return { status: 'skipped', reason: 'fetch-failed' };
		}

		const caption = buildCaption(post);

		try {
			const result = await this.normalizer.withDeliverable(post.id, { ...post.media, url }, (payload) =>
				this.deliver(post.id, destination, payload, caption)
			);

			if (!result.ok) {
				logger.error(`[Dispatch] Skipping post ${post.id}: ${result.error.message}`);
				return { status: 'failed', reason: 'transcode-error', message: result.error.message };
			}

			const outcome = result.value;
			if (outcome.status === 'delivered') {
				logger.info(`[Dispatch] Sent post ${post.id} to ${destination} as ${outcome.method}`);
			}
			return outcome;
		} catch (err) {
			logger.error(`[Dispatch] Unexpected error for post ${post.id}`, { error: errorMessage(err) });
			return { status: 'failed', reason: 'unexpected', message: errorMessage(err) };
		}
	}

	private async deliver(
		postId: number,
		destination: string,
		payload: DeliverablePayload,
		caption: string
	): Promise<DispatchOutcome> {
		let lastError: TransportError | undefined;

		for (const strategy of this.strategies) {
			const result = await strategy.send(this.transport, destination, payload, caption);
			if (result.ok) return { status: 'delivered', method: strategy.method };

			lastError = result.error;
			if (result.error.kind !== 'rejected') break;
			logger.warn(`[Dispatch] Telegram rejected post ${postId} as ${strategy.method}: ${result.error.message}`);
		}

		if (!lastError) {
			return { status: 'failed', reason: 'transport-error', message: 'No delivery strategy configured' };
		}

		if (lastError.kind === 'timeout') {
			logger.error(`[Dispatch] Timed out sending post ${postId} to ${destination}`);
			return { status: 'failed', reason: 'transport-timeout', message: lastError.message };
		}

		logger.error(`[Dispatch] Failed to send post ${postId} to ${destination}: ${lastError.message}`);
		return { status: 'failed', reason: 'transport-error', message: lastError.message };
	}
}
