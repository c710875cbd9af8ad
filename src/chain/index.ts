import type { CertificateRecord } from '../certificate/types';
import { assembleChain } from './ChainAssembler';
import { validateChain } from './TrustPathValidator';
import type { AssembleOptions, ChainForest } from './types';

export * from './types';
export * from './ValidityClassifier';
export * from './ChainAssembler';
export * from './TrustPathValidator';
export * from './traversal';

/**
 * Assembles and validates a certificate forest in one step
 */
export function buildCertificateForest(records: readonly CertificateRecord[], options?: AssembleOptions): ChainForest {
    return validateChain(assembleChain(records, options));
}
