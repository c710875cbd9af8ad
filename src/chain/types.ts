/**
 * Chain forest types
 *
 * @module chain/types
 */

import type { CertificateRecord, ExtensionRecord } from '../certificate/types';

/**
 * Time validity of a certificate relative to "now"
 */
export enum ValidityStatus {
    Valid = 'valid',
    /** Zero to the warning threshold (30 days by default) remaining */
    ExpiringSoon = 'expiring-soon',
    Expired = 'expired',
}

/**
 * Result of the name-matching chain check. This is not signature verification.
 */
export enum ValidationStatus {
    Valid = 'valid',
    InvalidChain = 'invalid-chain',
}

/** Placeholder carried by draft nodes until {@link validateChain} runs */
export const PENDING_VALIDATION = 'pending';

export type DraftValidationStatus = ValidationStatus | typeof PENDING_VALIDATION;

/**
 * Node produced by the assembler. Exclusively owns its children.
 */
export interface DraftChainNode {
    certificate: CertificateRecord;
    children: DraftChainNode[];
    validityStatus: ValidityStatus;
    validationStatus: DraftValidationStatus;
}

export interface DraftChainForest {
    roots: DraftChainNode[];
}

/**
 * Certificate record as carried by a finished node, read-only throughout
 */
export type FrozenCertificateRecord = Readonly<Omit<CertificateRecord, 'extensions' | 'subjectAltNames'>> & {
    readonly extensions: readonly Readonly<ExtensionRecord>[];
    readonly subjectAltNames: readonly string[];
};

/**
 * Finished node, read-only for presentation
 */
export interface ChainNode {
    readonly certificate: FrozenCertificateRecord;
    readonly children: readonly ChainNode[];
    readonly validityStatus: ValidityStatus;
    readonly validationStatus: ValidationStatus;
}

export interface ChainForest {
    readonly roots: readonly ChainNode[];
}

export interface AssembleOptions {
    /** Reference time for validity classification (default: current time) */
    now?: Date;
    /** Remaining days at or below which a certificate is expiring soon (default: 30) */
    expiringSoonDays?: number;
}
