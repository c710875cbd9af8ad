/**
 * Certificate retrieval from local files and remote hosts
 *
 * @module io/CertificateSource
 */

import { readFile } from 'node:fs/promises';
import { isIP } from 'node:net';
import * as tls from 'node:tls';
import { decodeCertificate, decodeCertificateChain } from '../certificate/CertificateDecoder';
import type { CertificateRecord } from '../certificate/types';
import { CertificateError, CertificateErrorCode } from '../CertificateError';
import { createLogger } from '../logger';

const logger = createLogger('source');

/** Standard HTTPS port */
export const HTTPS_PORT = 443;

/** Default timeout for network operations in milliseconds */
export const DEFAULT_TIMEOUT_MS = 10_000;

const PEM_CERTIFICATE_MARKER = '-----BEGIN CERTIFICATE-----';

/**
 * Opens a TLS connection and returns the peer's certificates as DER, leaf first
 */
export type TlsChainRetriever = (host: string, port: number, timeoutMs: number) => Promise<Uint8Array[]>;

export interface FetchChainOptions {
    /** Timeout for the HTTP request and the TLS handshake (default: 10000) */
    timeoutMs?: number;
    /** HTTP client (default: global fetch) */
    fetch?: typeof fetch;
    /** TLS peer chain retrieval (default: {@link retrievePeerChain}) */
    retrieveTlsChain?: TlsChainRetriever;
}

/**
 * The subset of a TLS peer certificate needed to walk the presented chain
 */
export interface PeerCertificateLink {
    raw?: Buffer;
    fingerprint256?: string;
    issuerCertificate?: PeerCertificateLink;
}

/**
 * Reads a certificate file.
 *
 * @throws {CertificateError} `not-found` when the file does not exist, `io` for other read failures
 */
export async function loadCertificateFile(path: string): Promise<Uint8Array> {
    try {
        return new Uint8Array(await readFile(path));
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            throw new CertificateError(CertificateErrorCode.NotFound, path, { cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new CertificateError(CertificateErrorCode.Io, message, { cause: error });
    }
}

/**
 * Retrieves certificates for a URL. A response body holding PEM certificates is
 * used as is; otherwise the chain presented in a TLS handshake with the host is
 * returned.
 */
export async function fetchCertificateChain(url: string, options: FetchChainOptions = {}): Promise<CertificateRecord[]> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (error) {
        throw new CertificateError(CertificateErrorCode.InvalidFormat, `invalid URL ${url}`, { cause: error });
    }

    const host = parsed.hostname.replace(/^\[|\]$/g, '');
    if (!host) {
        throw new CertificateError(CertificateErrorCode.InvalidFormat, `URL has no host: ${url}`);
    }

    const body = await fetchBody(parsed, options.fetch ?? fetch, timeoutMs);
    if (body && Buffer.from(body).toString('latin1').includes(PEM_CERTIFICATE_MARKER)) {
        return decodeCertificateChain(body);
    }

    const port = parsed.port ? Number(parsed.port) : HTTPS_PORT;
    const retrieve = options.retrieveTlsChain ?? retrievePeerChain;
    const chain = await retrieve(host, port, timeoutMs);
    if (chain.length === 0) {
        throw new CertificateError(CertificateErrorCode.X509Parse, 'No certificates found in TLS handshake');
    }

    return chain.map(der => decodeCertificate(der));
}

async function fetchBody(url: URL, client: typeof fetch, timeoutMs: number): Promise<Uint8Array | undefined> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await client(url, { signal: controller.signal });
        if (!response.ok) {
            logger.debug('HTTP request did not succeed, falling back to TLS', { status: response.status });
            return undefined;
        }
        return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
        logger.debug('HTTP request failed, falling back to TLS', {
            error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Follows `issuerCertificate` links from the leaf. Stops at a self-reference or
 * at a certificate that was already collected.
 */
export function collectPeerChain(peer: PeerCertificateLink): Uint8Array[] {
    const chain: Uint8Array[] = [];
    const seen = new Set<string>();
    let current: PeerCertificateLink | undefined = peer;

    while (current?.raw && current.raw.length > 0) {
        const key = current.fingerprint256 ?? current.raw.toString('base64');
        if (seen.has(key)) {
            break;
        }
        seen.add(key);
        chain.push(new Uint8Array(current.raw));

        current = current.issuerCertificate === current ? undefined : current.issuerCertificate;
    }

    return chain;
}

/**
 * Default {@link TlsChainRetriever} built on `node:tls`. The peer is not
 * verified: the certificates are only inspected.
 */
export function retrievePeerChain(host: string, port: number, timeoutMs: number): Promise<Uint8Array[]> {
    return new Promise((resolve, reject) => {
        const socket = tls.connect({
            host,
            port,
            servername: isIP(host) === 0 ? host : undefined,
            rejectUnauthorized: false,
        });

        socket.setTimeout(timeoutMs, () => {
            socket.destroy();
            reject(new CertificateError(CertificateErrorCode.Tls, `connection to ${host}:${port} timed out`));
        });

        socket.once('secureConnect', () => {
            const chain = collectPeerChain(socket.getPeerCertificate(true));
            socket.end();
            resolve(chain);
        });

        socket.on('error', error => {
            socket.destroy();
            reject(new CertificateError(CertificateErrorCode.Tls, error.message, { cause: error }));
        });
    });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
