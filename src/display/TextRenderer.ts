/**
 * Static text rendering of a certificate forest
 *
 * @module display/TextRenderer
 */

import { extractCommonName } from '../certificate/names';
import { walkForest } from '../chain/traversal';
import { ChainForest, ValidationStatus, ValidityStatus } from '../chain/types';
import { Colors, defaultColors } from './colors';

/** Column at which the status and expiry date start, regardless of depth */
export const DATE_COLUMN_START = 78;

const ROOT_PREFIX = '━ ';
const CHILD_MARKER = '└ ';

export const VALIDITY_LABELS: Record<ValidityStatus, string> = {
    [ValidityStatus.Valid]: 'VALID',
    [ValidityStatus.ExpiringSoon]: 'EXPIRES SOON',
    [ValidityStatus.Expired]: 'EXPIRED',
};

export function validityColor(status: ValidityStatus, colors: Colors): Colors {
    switch (status) {
        case ValidityStatus.Expired:
            return colors.red;
        case ValidityStatus.ExpiringSoon:
            return colors.yellow;
        case ValidityStatus.Valid:
            return colors.green;
    }
}

export function treePrefix(depth: number): string {
    // 5 columns for the first level, 4 more per level below it
    return depth === 0 ? ROOT_PREFIX : `${' '.repeat(5 + (depth - 1) * 4)}${CHILD_MARKER}`;
}

export function fitName(name: string, prefix: string): string {
    const available = Math.max(0, DATE_COLUMN_START - prefix.length - 5);
    if (name.length <= available) {
        return name;
    }
    const keep = available > 3 ? available - 3 : available;
    return `${name.slice(0, keep)}...`;
}

/**
 * One line per certificate in depth-first order:
 * `[n] <tree prefix><CN><padding>[STATUS] [until: <notAfter>]`
 */
export function renderChainText(forest: ChainForest, colors: Colors = defaultColors): string[] {
    const lines: string[] = [];

    walkForest(forest, (node, { depth, sequence }) => {
        const prefix = treePrefix(depth);
        const name = fitName(extractCommonName(node.certificate.subject), prefix);
        const nameEnd = prefix.length + name.length;
        const padding = ' '.repeat(nameEnd < DATE_COLUMN_START ? DATE_COLUMN_START - nameEnd : 1);
        const status = validityColor(node.validityStatus, colors);

        let line =
            colors.white(`[${sequence}] ${prefix}${name}${padding}`) +
            status(`[${VALIDITY_LABELS[node.validityStatus]}] [until: ${node.certificate.notAfter}]`);
        if (node.validationStatus === ValidationStatus.InvalidChain) {
            line += ` ${colors.red('[INVALID CHAIN]')}`;
        }
        lines.push(line);
    });

    return lines;
}
