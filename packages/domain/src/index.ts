export * from './types.js';
export * from './failures.js';
export * from './otp.js';
export * from './token-extractor.js';
