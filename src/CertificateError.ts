/**
 * Failure kinds reported by the certificate retrieval and decoding collaborators.
 * The chain core never raises these.
 */
export enum CertificateErrorCode {
    /** Reading local data failed */
    Io = 'io',
    /** The HTTP request failed */
    Http = 'http',
    /** The TLS connection or handshake failed */
    Tls = 'tls',
    /** The bytes could not be decoded as an X.509 certificate */
    X509Parse = 'x509-parse',
    /** The input (URL, PEM framing) is malformed */
    InvalidFormat = 'invalid-format',
    /** The requested certificate source does not exist */
    NotFound = 'not-found',
}

const DEFAULT_MESSAGES: Record<CertificateErrorCode, string> = {
    [CertificateErrorCode.Io]: 'IO error',
    [CertificateErrorCode.Http]: 'HTTP error',
    [CertificateErrorCode.Tls]: 'TLS error',
    [CertificateErrorCode.X509Parse]: 'X.509 parsing error',
    [CertificateErrorCode.InvalidFormat]: 'Invalid certificate format',
    [CertificateErrorCode.NotFound]: 'Certificate not found',
};

export class CertificateError extends Error {
    public readonly code: CertificateErrorCode;

    constructor(code: CertificateErrorCode, detail?: string, options?: { cause?: unknown }) {
        super(detail ? `${DEFAULT_MESSAGES[code]}: ${detail}` : DEFAULT_MESSAGES[code], options);
        this.name = 'CertificateError';
        this.code = code;
    }

    public static isCertificateError(error: unknown): error is CertificateError {
        return error instanceof CertificateError;
    }
}
