export { Dispatcher, DELIVERY_STRATEGIES } from './dispatcher';
export { TelegramTransport, TransportError, classifySendError } from './transport';

export type { DeliveryStrategy } from './dispatcher';
export type { MessagingTransport, SendErrorKind, SendResult, TelegramSendApi } from './transport';
