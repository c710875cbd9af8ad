import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it } from 'vitest';
import { decodeCertificateChain } from '../../src/certificate';
import { getVersion, runCli } from '../../src/cli';
import type { FetchChainOptions } from '../../src/io';
import { createIssuedCertificate, createSelfSignedCertificate, GeneratedCertificate } from '../utils/certificates';
import { testEnvironment } from './helpers';

describe('runCli', function () {
    let directory: string;
    let root: GeneratedCertificate;
    let leaf: GeneratedCertificate;
    let bundlePath: string;
    let singlePath: string;

    const treeLines = () => [
        `[1] ━ CLI Root${' '.repeat(68)}[VALID] [until: 2034-01-01 00:00:00]`,
        `[2] ${' '.repeat(5)}└ cli.test${' '.repeat(63)}[VALID] [until: 2030-01-01 00:00:00]`,
    ];

    beforeAll(async () => {
        directory = await mkdtemp(join(tmpdir(), 'cert-tree-cli-'));
        root = await createSelfSignedCertificate('CN=CLI Root');
        leaf = await createIssuedCertificate('CN=cli.test', root);
        bundlePath = join(directory, 'bundle.pem');
        singlePath = join(directory, 'single.pem');
        await writeFile(bundlePath, `${leaf.pem}\n${root.pem}\n`);
        await writeFile(singlePath, root.pem);
    });

    afterAll(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('prints help when no input is given', async () => {
        const io = testEnvironment();

        assert.equal(await runCli([], io), 0);
        assert.ok(io.out.join('').startsWith('Usage: cert-tree [options] [command]'));
    });

    it('prints the package version', async () => {
        const io = testEnvironment();

        assert.equal(await runCli(['--version'], io), 0);
        assert.equal(io.out.join(''), `${getVersion()}\n`);
    });

    it('renders a certificate bundle as a tree', async () => {
        const io = testEnvironment();

        assert.equal(await runCli(['--file', bundlePath], io), 0);
        assert.equal(io.out.join(''), `${treeLines().join('\n')}\n`);
        assert.deepEqual(io.err, []);
    });

    it('prints details for a single certificate', async () => {
        const io = testEnvironment();

        assert.equal(await runCli(['-f', singlePath], io), 0);
        assert.deepEqual(io.out.join('').split('\n').slice(0, 4), [
            'Certificate Information:',
            '======================',
            'CN: CLI Root',
            'Issuer: CN=CLI Root',
        ]);
    });

    it('lets --text override --interactive', async () => {
        const io = testEnvironment();

        assert.equal(await runCli(['-f', bundlePath, '-i', '-t'], io), 0);
        assert.equal(io.out.join(''), `${treeLines().join('\n')}\n`);
    });

    it('falls back to text output when input is not a terminal', async () => {
        const io = testEnvironment();

        assert.equal(await runCli(['-f', bundlePath, '-i'], io), 0);
        assert.equal(io.out.join(''), `${treeLines().join('\n')}\n`);
    });

    it('retrieves certificates for a URL with the configured timeout', async () => {
        const calls: [string, FetchChainOptions][] = [];
        const io = testEnvironment({
            env: { CERT_TREE_LOG_LEVEL: 'silent', CERT_TREE_TIMEOUT_MS: '1500' },
            fetchChain: async (url, options) => {
                calls.push([url, options]);
                return decodeCertificateChain(`${leaf.pem}\n${root.pem}`);
            },
        });

        assert.equal(await runCli(['-U', 'https://cli.test'], io), 0);
        assert.deepEqual(calls, [['https://cli.test', { timeoutMs: 1500 }]]);
        assert.equal(io.out.join(''), `${treeLines().join('\n')}\n`);
    });

    it('prefers the file when both file and URL are given', async () => {
        const io = testEnvironment();

        assert.equal(await runCli(['-f', singlePath, '-U', 'https://cli.test'], io), 0);
        assert.equal(io.out.join('').split('\n')[2], 'CN: CLI Root');
    });

    it('reports a missing file and exits with status 1', async () => {
        const io = testEnvironment();
        const missing = join(directory, 'missing.pem');

        assert.equal(await runCli(['-f', missing], io), 1);
        assert.equal(io.err.join(''), `error: Certificate not found: ${missing}\n`);
        assert.deepEqual(io.out, []);
    });

    it('reports undecodable input', async () => {
        const io = testEnvironment();
        const garbage = join(directory, 'garbage.bin');
        await writeFile(garbage, 'definitely not a certificate');

        assert.equal(await runCli(['-f', garbage], io), 1);
        assert.ok(io.err.join('').startsWith('error: X.509 parsing error: '));
    });

    it('rejects invalid configuration', async () => {
        const io = testEnvironment({ env: { CERT_TREE_TIMEOUT_MS: 'soon' } });

        assert.equal(await runCli(['-f', bundlePath], io), 1);
        assert.ok(io.err.join('').startsWith('error: Invalid configuration: CERT_TREE_TIMEOUT_MS: '));
    });

    it('rejects unknown options', async () => {
        const io = testEnvironment();

        assert.equal(await runCli(['--bogus'], io), 1);
        assert.equal(io.err.join(''), "error: unknown option '--bogus'\n");
    });
});
