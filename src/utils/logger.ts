import winston from 'winston';
import { APP_NAME, APP_VERSION } from '../constants';
import { LOG_LEVEL, NODE_ENV } from '../config';

const SENSITIVE_KEYS = ['password', 'token', 'api_key', 'apikey', 'secret', 'authorization'];

const sanitizeFormat = winston.format((info) => {
	const sanitize = (obj: unknown): unknown => {
		if (typeof obj !== 'object' || obj === null || obj instanceof Error) return obj;

		const sanitized: Record<string, unknown> = { ...obj };
		for (const key of Object.keys(sanitized)) {
			if (SENSITIVE_KEYS.some((sensitive) => key.toLowerCase().includes(sensitive))) {
				sanitized[key] = '[REDACTED]';
			} else if (typeof sanitized[key] === 'object') {
				sanitized[key] = sanitize(sanitized[key]);
			}
		}
		return sanitized;
	};

	for (const key of Object.keys(info)) {
		if (key === 'level' || key === 'message') continue;
		if (SENSITIVE_KEYS.some((sensitive) => key.toLowerCase().includes(sensitive))) {
			info[key] = '[REDACTED]';
		} else {
			info[key] = sanitize(info[key]);
		}
	}
	return info;
});

const logger = winston.createLogger({
	level: LOG_LEVEL,
	silent: NODE_ENV === 'test',
	format: winston.format.combine(
		winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
		winston.format.errors({ stack: true }),
		sanitizeFormat(),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: APP_NAME, version: APP_VERSION },
	transports: [
		new winston.transports.Console({
			format: winston.format.combine(
				winston.format.colorize(),
				winston.format.printf(({ timestamp, level, message, service, version: _version, ...meta }) => {
					const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
					return `${timestamp} [${service}] ${level}: ${message} ${metaStr}`.trimEnd();
				})
			),
		}),
	],
	exitOnError: false,
});

/** Message of an unknown thrown value, for log metadata. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export default logger;
