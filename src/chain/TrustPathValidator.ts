/**
 * Name-matching chain validation
 *
 * A root is valid when it is self-signed. Any other node is valid when its
 * parent's subject equals its issuer, compared byte for byte. No signatures are
 * checked, and a parent's status does not propagate to its children.
 *
 * @module chain/TrustPathValidator
 */

import type { CertificateRecord } from '../certificate/types';
import {
    ChainForest,
    ChainNode,
    DraftChainForest,
    DraftChainNode,
    FrozenCertificateRecord,
    ValidationStatus,
} from './types';

export function validateNode(certificate: CertificateRecord, parent?: CertificateRecord): ValidationStatus {
    const expectedIssuer = parent ? parent.subject : certificate.subject;
    return certificate.issuer === expectedIssuer ? ValidationStatus.Valid : ValidationStatus.InvalidChain;
}

function freezeCertificate(certificate: CertificateRecord): FrozenCertificateRecord {
    return Object.freeze({
        ...certificate,
        extensions: Object.freeze(certificate.extensions.map(extension => Object.freeze({ ...extension }))),
        subjectAltNames: Object.freeze([...certificate.subjectAltNames]),
    });
}

function finishNode(node: DraftChainNode, parent?: CertificateRecord): ChainNode {
    return Object.freeze({
        certificate: freezeCertificate(node.certificate),
        children: Object.freeze(node.children.map(child => finishNode(child, node.certificate))),
        validityStatus: node.validityStatus,
        validationStatus: validateNode(node.certificate, parent),
    });
}

/**
 * Assigns every node its final validation status and returns the frozen forest.
 */
export function validateChain(draft: DraftChainForest): ChainForest {
    return Object.freeze({ roots: Object.freeze(draft.roots.map(root => finishNode(root))) });
}
