export * from './CertificateSource';
