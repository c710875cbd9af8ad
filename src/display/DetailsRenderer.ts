import { extractCommonName } from '../certificate/names';
import type { FrozenCertificateRecord } from '../chain/types';

/**
 * Full field listing for a single certificate
 */
export function renderCertificateDetails(certificate: FrozenCertificateRecord): string[] {
    const lines = [
        'Certificate Information:',
        '======================',
        `CN: ${extractCommonName(certificate.subject)}`,
        `Issuer: ${certificate.issuer}`,
        `Serial Number: ${certificate.serialNumber}`,
        'Validity:',
        `  Not Before: ${certificate.notBefore}`,
        `  Not After: ${certificate.notAfter}`,
        `Public Key Algorithm: ${certificate.publicKeyAlgorithm}`,
        `Signature Algorithm: ${certificate.signatureAlgorithm}`,
        `Version: ${certificate.version}`,
        `Is CA: ${certificate.isCA}`,
    ];

    if (certificate.keyUsage) {
        lines.push(`Key Usage: ${certificate.keyUsage}`);
    }

    if (certificate.subjectAltNames.length > 0) {
        lines.push('Subject Alternative Names:');
        for (const name of certificate.subjectAltNames) {
            lines.push(`  ${name}`);
        }
    }

    lines.push('Extensions:');
    for (const extension of certificate.extensions) {
        const criticality = extension.critical ? 'critical' : 'non-critical';
        lines.push(`  ${extension.name ?? extension.oid} (${criticality}) - ${extension.value}`);
    }

    return lines;
}
