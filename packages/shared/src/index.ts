export * from './audio';
export * from './errors';
export * from './logger';
export * from './protocol';
export * from './requestOptions';
