export type DeliveryMethod = 'video' | 'animation';
export type SkipReason = 'blacklisted' | 'fetch-failed';
export type FailureReason = 'transcode-error' | 'transport-error' | 'transport-timeout' | 'unexpected';

export type DispatchOutcome =
	| { status: 'delivered'; method: DeliveryMethod }
	| { status: 'skipped'; reason: SkipReason }
	| { status: 'failed'; reason: FailureReason; message: string };

/** Media handed to the transport: a URL Telegram fetches itself, or a local file to upload. */
export type DeliverablePayload =
	| { kind: 'url'; url: string }
	| { kind: 'file'; path: string; filename: string };
