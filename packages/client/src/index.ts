export * from './audioInput';
export * from './backoff';
export * from './client';
export * from './codec';
export * from './config';
export * from './httpClient';
export * from './reassembler';
export * from './session';
export * from './slots';
export * from './transport';
export * from './wsTransport';
