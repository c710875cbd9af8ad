/**
 * Mapping of OIDs to human-readable names
 *
 * @module certificate/oids
 */

/**
 * X.509 extension names
 */
export const EXTENSION_NAMES: Readonly<Record<string, string>> = {
    // Standard X.509 extensions
    '2.5.29.14': 'Subject Key Identifier',
    '2.5.29.15': 'Key Usage',
    '2.5.29.16': 'Private Key Usage Period',
    '2.5.29.17': 'Subject Alternative Name',
    '2.5.29.18': 'Issuer Alternative Name',
    '2.5.29.19': 'Basic Constraints',
    '2.5.29.30': 'Name Constraints',
    '2.5.29.31': 'CRL Distribution Points',
    '2.5.29.32': 'Certificate Policies',
    '2.5.29.33': 'Policy Mappings',
    '2.5.29.35': 'Authority Key Identifier',
    '2.5.29.36': 'Policy Constraints',
    '2.5.29.37': 'Extended Key Usage',
    '2.5.29.46': 'Freshest CRL',

    // Microsoft
    '1.3.6.1.4.1.311.20.2': 'Microsoft Smart Card Login',
    '1.3.6.1.4.1.311.21.1': 'Microsoft Individual Code Signing',

    // Entrust
    '1.2.840.113533.7.65.0': 'Entrust Version Information',

    // Netscape
    '2.16.840.1.113730.1.1': 'Netscape Certificate Type',

    // VeriSign
    '2.23.42.7.0': 'VeriSign Individual SHA1 Hash',

    '1.3.6.1.5.5.7.1.1': 'Authority Information Access',
    '1.3.6.1.4.1.11129.2.4.2': 'Signed Certificate Timestamp',
};

/**
 * Signature algorithm names
 */
export const SIGNATURE_ALGORITHM_NAMES: Readonly<Record<string, string>> = {
    '1.2.840.113549.1.1.4': 'RSA with MD5',
    '1.2.840.113549.1.1.5': 'SHA1 with RSA',
    '1.2.840.113549.1.1.10': 'RSASSA-PSS',
    '1.2.840.113549.1.1.11': 'SHA256 with RSA',
    '1.2.840.113549.1.1.12': 'SHA384 with RSA',
    '1.2.840.113549.1.1.13': 'SHA512 with RSA',
    '1.3.14.3.2.29': 'SHA1 with RSA',
    '1.2.840.10045.4.1': 'SHA1 with ECDSA',
    '1.2.840.10045.4.3.2': 'SHA256 with ECDSA',
    '1.2.840.10045.4.3.3': 'SHA384 with ECDSA',
    '1.2.840.10045.4.3.4': 'SHA512 with ECDSA',
    '1.2.840.10040.4.3': 'SHA1 with DSA',
    '1.3.101.112': 'Ed25519',
    '1.3.101.113': 'Ed448',
};

/**
 * Subject public key algorithm identifiers
 */
export const PUBLIC_KEY_OID = {
    Rsa: '1.2.840.113549.1.1.1',
    RsaPss: '1.2.840.113549.1.1.10',
    Ec: '1.2.840.10045.2.1',
    Dsa: '1.2.840.10040.4.1',
    Ed25519: '1.3.101.112',
    Ed448: '1.3.101.113',
    Gost2001: '1.2.643.2.2.19',
    Gost2012_256: '1.2.643.7.1.1.1.1',
    Gost2012_512: '1.2.643.7.1.1.1.2',
} as const;

export function extensionName(oid: string): string | undefined {
    return EXTENSION_NAMES[oid];
}

export function signatureAlgorithmName(oid: string): string | undefined {
    return SIGNATURE_ALGORITHM_NAMES[oid];
}

/**
 * Extended Key Usage purposes
 */
export const EXTENDED_KEY_USAGE_NAMES: Readonly<Record<string, string>> = {
    '1.3.6.1.5.5.7.3.1': 'TLS Web Server Authentication',
    '1.3.6.1.5.5.7.3.2': 'TLS Web Client Authentication',
    '1.3.6.1.5.5.7.3.3': 'Code Signing',
    '1.3.6.1.5.5.7.3.4': 'E-mail Protection',
    '1.3.6.1.5.5.7.3.8': 'Time Stamping',
    '1.3.6.1.5.5.7.3.9': 'OCSP Signing',
    '1.3.6.1.5.5.7.3.36': 'Document Signing',
};
