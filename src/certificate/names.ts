/**
 * Returns the value of the first `CN=` component of a distinguished name,
 * or the whole name when it has none.
 */
export function extractCommonName(distinguishedName: string): string {
    for (const part of distinguishedName.split(',')) {
        const trimmed = part.trim();
        if (trimmed.startsWith('CN=')) {
            return trimmed.slice('CN='.length);
        }
    }
    return distinguishedName;
}

export function explainSignatureAlgorithm(algorithm: string): string {
    if (algorithm.includes('RSA')) {
        return (
            'This certificate uses RSA encryption with hashing. RSA is like a digital lock that only the certificate ' +
            'issuer has the key to open. The hashing creates a unique fingerprint of the certificate data. Together, ' +
            'they create a digital signature that proves the certificate is genuine and has not been tampered with.'
        );
    }
    if (algorithm.includes('ECDSA')) {
        return (
            'This certificate uses the Elliptic Curve Digital Signature Algorithm (ECDSA). It creates digital ' +
            'signatures using elliptic curve mathematics. Like RSA, the signature proves the certificate is ' +
            'authentic, but with smaller keys and faster operations.'
        );
    }
    if (algorithm.includes('DSA')) {
        return (
            'This certificate uses the Digital Signature Algorithm (DSA). It produces a code that only the ' +
            'legitimate issuer can create, which lets anyone check that the certificate was not forged.'
        );
    }
    return (
        'This is a cryptographic signature method that verifies the certificate. It produces a digital signature ' +
        'proving the certificate is legitimate and has not been altered.'
    );
}
