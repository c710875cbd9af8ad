import type { CertificateRecord } from '../../src/certificate/types';

/**
 * Minimal record for chain tests that do not need real certificates
 */
export function record(subject: string, issuer: string, notAfter = '2030-01-01 00:00:00'): CertificateRecord {
    return {
        subject,
        issuer,
        serialNumber: '01',
        notBefore: '2020-01-01 00:00:00',
        notAfter,
        publicKeyAlgorithm: 'ECDSA',
        signatureAlgorithm: 'SHA256 with ECDSA',
        version: 3,
        extensions: [],
        isCA: false,
        subjectAltNames: [],
    };
}
