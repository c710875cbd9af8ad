import assert from 'node:assert/strict';
import { describe, it } from 'vitest';
import { explainSignatureAlgorithm, extractCommonName } from '../../src/certificate';

describe('extractCommonName', () => {
    it('returns the first CN component', () => {
        assert.equal(extractCommonName('C=US, O=Example, CN=Example Root, CN=Second'), 'Example Root');
    });

    it('trims whitespace around components', () => {
        assert.equal(extractCommonName('O=Example,   CN=Spaced  '), 'Spaced');
    });

    it('returns the whole name when there is no CN', () => {
        assert.equal(extractCommonName('O=Example, C=US'), 'O=Example, C=US');
    });
});

describe('explainSignatureAlgorithm', () => {
    it('explains RSA algorithms', () => {
        assert.ok(explainSignatureAlgorithm('SHA256 with RSA').startsWith('This certificate uses RSA encryption with hashing.'));
    });

    it('explains ECDSA before the generic DSA text', () => {
        assert.ok(
            explainSignatureAlgorithm('SHA256 with ECDSA').startsWith(
                'This certificate uses the Elliptic Curve Digital Signature Algorithm (ECDSA).',
            ),
        );
    });

    it('explains DSA', () => {
        assert.ok(
            explainSignatureAlgorithm('SHA1 with DSA').startsWith('This certificate uses the Digital Signature Algorithm (DSA).'),
        );
    });

    it('falls back to a generic explanation', () => {
        assert.ok(
            explainSignatureAlgorithm('Ed25519').startsWith(
                'This is a cryptographic signature method that verifies the certificate.',
            ),
        );
    });
});
