import assert from 'node:assert/strict';
import { describe, it } from 'vitest';
import { assembleChain, validateChain, validateNode, ValidationStatus } from '../../src/chain';
import { record } from '../utils/records';

describe('validateNode', () => {
    it('accepts a self-signed root', () => {
        assert.equal(validateNode(record('CN=Root', 'CN=Root')), ValidationStatus.Valid);
    });

    it('rejects a root that is not self-signed', () => {
        assert.equal(validateNode(record('CN=Leaf', 'CN=Elsewhere')), ValidationStatus.InvalidChain);
    });

    it('compares issuer and parent subject exactly', () => {
        const parent = record('CN=Root, O=Example', 'CN=Root, O=Example');
        assert.equal(validateNode(record('CN=Leaf', 'CN=Root, O=Example'), parent), ValidationStatus.Valid);
        assert.equal(validateNode(record('CN=Leaf', 'CN=Root,O=Example'), parent), ValidationStatus.InvalidChain);
        assert.equal(validateNode(record('CN=Leaf', 'cn=Root, O=Example'), parent), ValidationStatus.InvalidChain);
    });
});

describe('validateChain', () => {
    it('does not propagate an invalid parent to its children', () => {
        const forest = validateChain(assembleChain([record('CN=Int', 'CN=Gone'), record('CN=Leaf', 'CN=Int')]));

        const [root] = forest.roots;
        assert.equal(root.validationStatus, ValidationStatus.InvalidChain);
        assert.equal(root.children[0].validationStatus, ValidationStatus.Valid);
    });

    it('returns a frozen forest', () => {
        const forest = validateChain(assembleChain([record('CN=Root', 'CN=Root')]));

        assert.ok(Object.isFrozen(forest));
        assert.ok(Object.isFrozen(forest.roots));
        assert.ok(Object.isFrozen(forest.roots[0]));
        assert.ok(Object.isFrozen(forest.roots[0].certificate));
    });

    it('copies and freezes the certificate lists', () => {
        const source = {
            ...record('CN=Root', 'CN=Root'),
            subjectAltNames: ['DNS:root.test'],
            extensions: [{ oid: '2.5.29.19', name: 'Basic Constraints', critical: true, value: 'CA:TRUE' }],
        };
        const { certificate } = validateChain(assembleChain([source])).roots[0];

        assert.ok(Object.isFrozen(certificate.subjectAltNames));
        assert.ok(Object.isFrozen(certificate.extensions));
        assert.ok(Object.isFrozen(certificate.extensions[0]));

        source.subjectAltNames.push('DNS:other.test');
        source.extensions[0].value = 'CA:FALSE';
        assert.deepEqual(certificate.subjectAltNames, ['DNS:root.test']);
        assert.equal(certificate.extensions[0].value, 'CA:TRUE');
    });

    it('leaves the draft untouched', () => {
        const draft = assembleChain([record('CN=Root', 'CN=Root')]);
        validateChain(draft);
        assert.equal(draft.roots[0].validationStatus, 'pending');
    });
});
