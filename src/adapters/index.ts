/**
 * Endpoint adapters, one per remote operation.
 */

export * from './response';
export * from './linkpage';
export * from './qrcode';
export * from './media';
export * from './storage';
