export * from './types';
export * from './errors';
export * from './json';
export * from './endpoint';
export * from './headers';
export * from './configuration';
export * from './decoding';
export { RequestBuilder } from './requestBuilder';
export type { RequestBuilderOptions } from './requestBuilder';
export * from './interceptor';
export * from './validator';
export { RequestExecutor } from './executor';
export type { RequestExecutorOptions, RequestOptions } from './executor';
export * from './session';
export { FileSessionStore } from './fileSessionStore';
export * from './tokenRefresher';
export { ConsoleLogger, createDefaultRequestExecutor } from './factories';
export type { DefaultRequestExecutorConfig } from './factories';
export * from './networking';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
