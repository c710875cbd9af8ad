/**
 * Certificate record types
 *
 * @module certificate/types
 */

/**
 * A single X.509v3 extension in display form
 */
export interface ExtensionRecord {
    /** Dotted extension OID */
    oid: string;
    /** Human-readable name, when the OID is known */
    name?: string;
    critical: boolean;
    /** Readable rendering of the extension value */
    value: string;
}

/**
 * Decoded certificate fields. The subject string is the certificate's identity
 * when chains are assembled.
 */
export interface CertificateRecord {
    subject: string;
    issuer: string;
    /** Hex byte pairs separated by spaces */
    serialNumber: string;
    /** `YYYY-MM-DD HH:MM:SS`, UTC */
    notBefore: string;
    /** `YYYY-MM-DD HH:MM:SS`, UTC */
    notAfter: string;
    publicKeyAlgorithm: string;
    signatureAlgorithm: string;
    version: number;
    extensions: ExtensionRecord[];
    isCA: boolean;
    keyUsage?: string;
    subjectAltNames: string[];
}
