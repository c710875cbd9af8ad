/**
 * Chain assembly
 *
 * Groups certificate records into rooted trees by issuer/subject name linkage.
 * Subjects are identity keys: when two records share a subject only one node is
 * created for it.
 *
 * @module chain/ChainAssembler
 */

import type { CertificateRecord } from '../certificate/types';
import { createLogger } from '../logger';
import { AssembleOptions, DraftChainForest, DraftChainNode, PENDING_VALIDATION } from './types';
import { classifyValidity, DEFAULT_EXPIRING_SOON_DAYS } from './ValidityClassifier';

const logger = createLogger('assembler');

export class ChainAssembler {
    private readonly options: Required<AssembleOptions>;

    constructor(options: AssembleOptions = {}) {
        this.options = {
            now: options.now ?? new Date(),
            expiringSoonDays: options.expiringSoonDays ?? DEFAULT_EXPIRING_SOON_DAYS,
        };
    }

    /**
     * Builds a draft forest. Root order and child order follow input order.
     */
    public assemble(records: readonly CertificateRecord[]): DraftChainForest {
        // a later record with the same subject replaces the earlier one for lookups
        const bySubject = new Map<string, CertificateRecord>();
        const issuedBy = new Map<string, string[]>();

        for (const record of records) {
            bySubject.set(record.subject, record);

            const issued = issuedBy.get(record.issuer);
            if (issued) {
                issued.push(record.subject);
            } else {
                issuedBy.set(record.issuer, [record.subject]);
            }
        }

        const processed = new Set<string>();
        const roots: DraftChainNode[] = [];

        // self-signed, or issued by a subject we were not given
        for (const record of records) {
            const isRoot = !bySubject.has(record.issuer) || record.subject === record.issuer;
            if (isRoot && !processed.has(record.subject)) {
                roots.push(this.materialize(record, bySubject, issuedBy, processed));
            }
        }

        // whatever is left sits in an issuer cycle or hangs off one
        for (const record of records) {
            if (!processed.has(record.subject)) {
                logger.debug('Promoting unreachable certificate to root', { subject: record.subject });
                roots.push(this.materialize(record, bySubject, issuedBy, processed));
            }
        }

        logger.debug('Assembled certificate forest', { records: records.length, roots: roots.length });
        return { roots };
    }

    private materialize(
        record: CertificateRecord,
        bySubject: ReadonlyMap<string, CertificateRecord>,
        issuedBy: ReadonlyMap<string, string[]>,
        processed: Set<string>,
    ): DraftChainNode {
        // mark before descending so an issuer cycle cannot recurse forever
        processed.add(record.subject);

        const children: DraftChainNode[] = [];
        for (const subject of issuedBy.get(record.subject) ?? []) {
            const child = bySubject.get(subject);
            if (child && !processed.has(subject)) {
                children.push(this.materialize(child, bySubject, issuedBy, processed));
            }
        }

        return {
            certificate: record,
            children,
            validityStatus: classifyValidity(record.notAfter, this.options.now, this.options.expiringSoonDays),
            validationStatus: PENDING_VALIDATION,
        };
    }
}

export function assembleChain(records: readonly CertificateRecord[], options?: AssembleOptions): DraftChainForest {
    return new ChainAssembler(options).assemble(records);
}
