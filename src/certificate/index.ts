export * from './types';
export * from './oids';
export * from './names';
export * from './timestamps';
export * from './CertificateDecoder';
