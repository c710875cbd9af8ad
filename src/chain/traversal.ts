import type { ChainForest, ChainNode } from './types';

export interface VisitContext {
    depth: number;
    /** 1-based position in depth-first pre-order */
    sequence: number;
    parent?: ChainNode;
}

export type ChainVisitor = (node: ChainNode, context: VisitContext) => void;

/**
 * Depth-first pre-order walk over every node of the forest
 */
export function walkForest(forest: ChainForest, visitor: ChainVisitor): void {
    let sequence = 0;
    const visit = (node: ChainNode, depth: number, parent?: ChainNode): void => {
        sequence++;
        visitor(node, { depth, sequence, parent });
        for (const child of node.children) {
            visit(child, depth + 1, node);
        }
    };
    for (const root of forest.roots) {
        visit(root, 0);
    }
}

export function countNodes(forest: ChainForest): number {
    let count = 0;
    walkForest(forest, () => count++);
    return count;
}
