export * from './CertificateError';
export * from './config';
export * from './logger';
export * from './certificate';
export * from './chain';
export * from './io';
export * from './display';
export * from './cli';
