/**
 * Terminal-independent state and layout of the interactive browser.
 * Key handling is a pure reducer so it can be exercised without a TTY.
 *
 * @module display/browser/BrowserState
 */

import { extractCommonName, explainSignatureAlgorithm } from '../../certificate/names';
import { TIMESTAMP_PATTERN } from '../../certificate/timestamps';
import { walkForest } from '../../chain/traversal';
import { ChainForest, FrozenCertificateRecord, ValidationStatus, ValidityStatus } from '../../chain/types';
import { Colors, defaultColors } from '../colors';
import { VALIDITY_LABELS, validityColor } from '../TextRenderer';

export const MAX_DETAILS_SCROLL = 50;
export const PAGE_SIZE = 10;

export interface BrowserItem {
    displayName: string;
    validUntil: string;
    validityStatus: ValidityStatus;
    validationStatus: ValidationStatus;
    certificate: FrozenCertificateRecord;
}

export interface BrowserState {
    selected: number;
    detailsScroll: number;
    /** Whether Up/Down scroll the details pane instead of moving the selection */
    detailsActive: boolean;
}

export type BrowserKey = 'up' | 'down' | 'pageup' | 'pagedown' | 'tab' | 'quit' | 'text' | 'other';

export type BrowserEffect = 'none' | 'quit' | 'text-mode';

export interface BrowserTransition {
    state: BrowserState;
    effect: BrowserEffect;
}

export interface ScreenSize {
    columns: number;
    rows: number;
}

export interface ScreenOptions {
    version?: string;
    colors?: Colors;
}

export function flattenForest(forest: ChainForest): BrowserItem[] {
    const items: BrowserItem[] = [];
    walkForest(forest, (node, { depth, sequence }) => {
        items.push({
            displayName: `[${sequence}] ${'  '.repeat(depth)}${extractCommonName(node.certificate.subject)}`,
            validUntil: node.certificate.notAfter,
            validityStatus: node.validityStatus,
            validationStatus: node.validationStatus,
            certificate: node.certificate,
        });
    });
    return items;
}

export function initialBrowserState(): BrowserState {
    return { selected: 0, detailsScroll: 0, detailsActive: false };
}

/**
 * Maps a readline keypress to a browser key
 */
export function toBrowserKey(sequence: string | undefined, key?: { name?: string; ctrl?: boolean }): BrowserKey {
    if (key?.ctrl && key.name === 'c') {
        return 'quit';
    }
    switch (key?.name ?? sequence) {
        case 'q':
        case 'escape':
            return 'quit';
        case 't':
            return 'text';
        case 'tab':
            return 'tab';
        case 'up':
            return 'up';
        case 'down':
            return 'down';
        case 'pageup':
            return 'pageup';
        case 'pagedown':
            return 'pagedown';
        default:
            return 'other';
    }
}

export function reduceBrowserKey(state: BrowserState, key: BrowserKey, itemCount: number): BrowserTransition {
    const last = Math.max(0, itemCount - 1);
    const next = (patch: Partial<BrowserState>): BrowserTransition => ({
        state: { ...state, ...patch },
        effect: 'none',
    });

    switch (key) {
        case 'quit':
            return { state, effect: 'quit' };
        case 'text':
            return { state, effect: 'text-mode' };
        case 'tab':
            return next({ detailsActive: !state.detailsActive });
        case 'up':
            return state.detailsActive
                ? next({ detailsScroll: Math.max(0, state.detailsScroll - 1) })
                : next({ selected: Math.max(0, state.selected - 1) });
        case 'down':
            return state.detailsActive
                ? next({ detailsScroll: Math.min(MAX_DETAILS_SCROLL, state.detailsScroll + 1) })
                : next({ selected: Math.min(last, state.selected + 1) });
        case 'pageup':
            return state.detailsActive ? next({}) : next({ selected: Math.max(0, state.selected - PAGE_SIZE) });
        case 'pagedown':
            return state.detailsActive ? next({}) : next({ selected: Math.min(last, state.selected + PAGE_SIZE) });
        case 'other':
            return next({});
    }
}

/**
 * Shortens normalized timestamps to fit narrow terminals
 */
export function formatListDate(validUntil: string, columns: number): string {
    if (!TIMESTAMP_PATTERN.test(validUntil)) {
        return validUntil;
    }
    if (columns < 80) {
        return validUntil.slice(5, 16);
    }
    if (columns < 100) {
        return validUntil.slice(0, 16);
    }
    return validUntil;
}

export function wrapText(text: string, width: number): string[] {
    if (width <= 0) {
        return [text];
    }
    const lines: string[] = [];
    let current = '';
    for (const word of text.split(' ')) {
        const candidate = current ? `${current} ${word}` : word;
        if (candidate.length <= width) {
            current = candidate;
            continue;
        }
        if (current) {
            lines.push(current);
        }
        let rest = word;
        while (rest.length > width) {
            lines.push(rest.slice(0, width));
            rest = rest.slice(width);
        }
        current = rest;
    }
    lines.push(current);
    return lines;
}

interface Segment {
    text: string;
    style?: (text: string) => string;
}

function fitSegments(segments: Segment[], width: number): string {
    let remaining = width;
    let output = '';
    for (const { text, style } of segments) {
        if (remaining <= 0) {
            break;
        }
        const visible = text.slice(0, remaining);
        remaining -= visible.length;
        output += style ? style(visible) : visible;
    }
    return output + ' '.repeat(Math.max(0, remaining));
}

function drawBox(title: string, content: Segment[][], width: number, height: number, border: Colors): string[] {
    const inner = Math.max(0, width - 2);
    const heading = ` ${title} `.slice(0, inner);
    const lines = [border(`┌${heading}${'─'.repeat(inner - heading.length)}┐`)];
    for (let i = 0; i < Math.max(0, height - 2); i++) {
        lines.push(border('│') + fitSegments(content[i] ?? [], inner) + border('│'));
    }
    lines.push(border(`└${'─'.repeat(inner)}┘`));
    return lines;
}

function detailSegments(certificate: FrozenCertificateRecord, width: number, colors: Colors): Segment[][] {
    const entries: [string, string][] = [
        ['Subject: ', certificate.subject],
        ['Issuer: ', certificate.issuer],
        ['Serial Number: ', certificate.serialNumber],
        ['Not Before: ', certificate.notBefore],
        ['Not After: ', certificate.notAfter],
        ['Public Key: ', certificate.publicKeyAlgorithm],
        ['Signature Algorithm: ', certificate.signatureAlgorithm],
        ['', explainSignatureAlgorithm(certificate.signatureAlgorithm)],
        ['Version: ', String(certificate.version)],
        ['CA: ', certificate.isCA ? 'yes' : 'no'],
    ];
    if (certificate.keyUsage) {
        entries.push(['Key Usage: ', certificate.keyUsage]);
    }
    for (const name of certificate.subjectAltNames) {
        entries.push(['SAN: ', name]);
    }
    for (const extension of certificate.extensions) {
        entries.push([`${extension.name ?? extension.oid}: `, extension.value]);
    }

    const lines: Segment[][] = [];
    for (const [label, value] of entries) {
        const wrapped = wrapText(label + value, width);
        wrapped.forEach((line, index) => {
            if (index === 0 && label) {
                lines.push([
                    { text: line.slice(0, label.length), style: colors.blue },
                    { text: line.slice(label.length) },
                ]);
            } else {
                lines.push([{ text: line }]);
            }
        });
    }
    return lines;
}

/**
 * Full-screen frame: title bar, certificate list, details pane, key help
 */
export function renderBrowserScreen(
    items: readonly BrowserItem[],
    state: BrowserState,
    size: ScreenSize,
    options: ScreenOptions = {},
): string[] {
    const colors = options.colors ?? defaultColors;
    const width = Math.max(20, size.columns);
    const inner = width - 2;
    const body = Math.max(4, size.rows - 6);
    const listHeight = Math.max(3, Math.floor(body / 2));
    const detailsHeight = Math.max(3, body - listHeight);

    const title = 'Certificate Chain Inspector';
    const version = options.version ? `v${options.version}` : '';
    const gap = Math.max(1, inner - title.length - version.length);
    const lines = drawBox('', [[{ text: title, style: colors.bold }, { text: ' '.repeat(gap) }, { text: version }]], width, 3, colors.cyan);

    const visibleRows = listHeight - 2;
    const offset = Math.max(0, state.selected - visibleRows + 1);
    const dateWidth = formatListDate('0000-00-00 00:00:00', width).length;
    const nameWidth = Math.max(8, inner - dateWidth - 7);
    const listContent = items.slice(offset, offset + visibleRows).map((item, index): Segment[] => {
        const selected = offset + index === state.selected;
        const style = validityColor(item.validityStatus, colors);
        const rowStyle = selected ? (text: string) => colors.bold(style(text)) : style;
        const name = item.displayName.length > nameWidth ? `${item.displayName.slice(0, nameWidth - 3)}...` : item.displayName;
        return [
            { text: selected ? '>> ' : '   ' },
            { text: name.padEnd(nameWidth), style: rowStyle },
            { text: ' ' },
            { text: formatListDate(item.validUntil, width).padStart(dateWidth), style: rowStyle },
        ];
    });
    lines.push(...drawBox('Certificates', listContent, width, listHeight, state.detailsActive ? colors.white : colors.yellow));

    const current = items[state.selected];
    let detailsContent: Segment[][] = [];
    if (current) {
        const status = validityColor(current.validityStatus, colors);
        const header: Segment[][] = [
            [
                { text: 'Status: ', style: colors.blue },
                { text: VALIDITY_LABELS[current.validityStatus], style: status },
                ...(current.validationStatus === ValidationStatus.InvalidChain
                    ? [{ text: ' [INVALID CHAIN]', style: colors.red }]
                    : []),
            ],
        ];
        detailsContent = [...header, ...detailSegments(current.certificate, inner, colors)].slice(state.detailsScroll);
    }
    lines.push(...drawBox('Details', detailsContent, width, detailsHeight, state.detailsActive ? colors.yellow : colors.white));

    const help = state.detailsActive
        ? 'Tab: certificate list | Up/Down: scroll details | t: text mode | q/Esc: quit'
        : 'Tab: details | Up/Down: select | PgUp/PgDn: page | t: text mode | q/Esc: quit';
    lines.push(...drawBox('', [[{ text: help, style: colors.gray }]], width, 3, colors.cyan));

    return lines;
}
