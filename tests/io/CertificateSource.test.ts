import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it } from 'vitest';
import { CertificateError, CertificateErrorCode } from '../../src/CertificateError';
import {
    collectPeerChain,
    fetchCertificateChain,
    loadCertificateFile,
    PeerCertificateLink,
    TlsChainRetriever,
} from '../../src/io';
import { createIssuedCertificate, createSelfSignedCertificate, GeneratedCertificate } from '../utils/certificates';

function hasCode(code: CertificateErrorCode) {
    return (error: unknown): boolean => error instanceof CertificateError && error.code === code;
}

describe('CertificateSource', function () {
    let directory: string;
    let root: GeneratedCertificate;
    let leaf: GeneratedCertificate;

    beforeAll(async () => {
        directory = await mkdtemp(join(tmpdir(), 'cert-tree-io-'));
        root = await createSelfSignedCertificate('CN=Source Root');
        leaf = await createIssuedCertificate('CN=source.test', root);
    });

    afterAll(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    describe('loadCertificateFile', () => {
        it('reads the file contents', async () => {
            const path = join(directory, 'bundle.pem');
            await writeFile(path, root.pem);

            const data = await loadCertificateFile(path);
            assert.equal(Buffer.from(data).toString('utf-8'), root.pem);
        });

        it('reports a missing file as not found', async () => {
            const path = join(directory, 'missing.pem');
            await assert.rejects(loadCertificateFile(path), (error: unknown) => {
                assert.ok(error instanceof CertificateError);
                assert.equal(error.code, CertificateErrorCode.NotFound);
                assert.equal(error.message, `Certificate not found: ${path}`);
                return true;
            });
        });

        it('reports other read failures as IO errors', async () => {
            await assert.rejects(loadCertificateFile(directory), hasCode(CertificateErrorCode.Io));
        });
    });

    describe('fetchCertificateChain', () => {
        it('decodes PEM certificates served in the response body', async () => {
            let requested = '';
            const records = await fetchCertificateChain('https://pki.test/chain.pem', {
                fetch: async (input: RequestInfo | URL) => {
                    requested = String(input);
                    return new Response(`${leaf.pem}\n${root.pem}`);
                },
                retrieveTlsChain: async () => assert.fail('TLS should not be used'),
            });

            assert.equal(requested, 'https://pki.test/chain.pem');
            assert.deepEqual(
                records.map(record => record.subject),
                ['CN=source.test', 'CN=Source Root'],
            );
        });

        it('falls back to the TLS handshake when the body holds no certificate', async () => {
            const calls: [string, number, number][] = [];
            const retrieve: TlsChainRetriever = async (host, port, timeoutMs) => {
                calls.push([host, port, timeoutMs]);
                return [new Uint8Array(leaf.certificate.rawData), new Uint8Array(root.certificate.rawData)];
            };

            const records = await fetchCertificateChain('https://site.test/', {
                timeoutMs: 500,
                fetch: async () => new Response('<html></html>'),
                retrieveTlsChain: retrieve,
            });

            assert.deepEqual(calls, [['site.test', 443, 500]]);
            assert.deepEqual(
                records.map(record => record.subject),
                ['CN=source.test', 'CN=Source Root'],
            );
        });

        it('falls back to TLS when the HTTP request fails', async () => {
            const calls: [string, number][] = [];
            const records = await fetchCertificateChain('https://[::1]:8443/', {
                fetch: async () => {
                    throw new TypeError('fetch failed');
                },
                retrieveTlsChain: async (host, port) => {
                    calls.push([host, port]);
                    return [new Uint8Array(root.certificate.rawData)];
                },
            });

            assert.deepEqual(calls, [['::1', 8443]]);
            assert.equal(records.length, 1);
        });

        it('falls back to TLS on an unsuccessful status', async () => {
            const records = await fetchCertificateChain('https://site.test/', {
                fetch: async () => new Response(root.pem, { status: 404 }),
                retrieveTlsChain: async () => [new Uint8Array(leaf.certificate.rawData)],
            });

            assert.deepEqual(
                records.map(record => record.subject),
                ['CN=source.test'],
            );
        });

        it('rejects an empty TLS chain', async () => {
            await assert.rejects(
                fetchCertificateChain('https://site.test/', {
                    fetch: async () => new Response(''),
                    retrieveTlsChain: async () => [],
                }),
                hasCode(CertificateErrorCode.X509Parse),
            );
        });

        it('rejects a malformed URL', async () => {
            await assert.rejects(fetchCertificateChain('not a url'), hasCode(CertificateErrorCode.InvalidFormat));
        });
    });

    describe('collectPeerChain', () => {
        it('follows issuer links until the self-signed root', () => {
            const rootPeer: PeerCertificateLink = { raw: Buffer.from([3]), fingerprint256: 'root' };
            rootPeer.issuerCertificate = rootPeer;
            const intermediate: PeerCertificateLink = {
                raw: Buffer.from([2]),
                fingerprint256: 'intermediate',
                issuerCertificate: rootPeer,
            };
            const leafPeer: PeerCertificateLink = {
                raw: Buffer.from([1]),
                fingerprint256: 'leaf',
                issuerCertificate: intermediate,
            };

            assert.deepEqual(
                collectPeerChain(leafPeer).map(der => [...der]),
                [[1], [2], [3]],
            );
        });

        it('stops at a certificate that was already collected', () => {
            const a: PeerCertificateLink = { raw: Buffer.from([1]), fingerprint256: 'a' };
            const b: PeerCertificateLink = { raw: Buffer.from([2]), fingerprint256: 'b', issuerCertificate: a };
            a.issuerCertificate = b;

            assert.deepEqual(
                collectPeerChain(a).map(der => [...der]),
                [[1], [2]],
            );
        });

        it('returns nothing for an empty peer', () => {
            assert.deepEqual(collectPeerChain({}), []);
        });
    });
});
