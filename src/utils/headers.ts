import { APP_NAME, APP_VERSION } from '../constants';

export interface ApiIdentity {
	username: string;
	apiKey?: string;
}

/** e621 rejects requests without a descriptive User-Agent naming the operator. */
export function buildUserAgent(username: string): string {
	return `${APP_NAME}/${APP_VERSION} (by ${username} on e621)`;
}

export function buildHeaders(identity: ApiIdentity): Record<string, string> {
	const headers: Record<string, string> = {
		'User-Agent': buildUserAgent(identity.username),
		Accept: 'application/json',
	};

	if (identity.apiKey) {
		const credentials = Buffer.from(`${identity.username}:${identity.apiKey}`).toString('base64');
		headers['Authorization'] = `Basic ${credentials}`;
	}

	return headers;
}
