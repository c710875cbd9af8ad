import * as readline from 'node:readline';

import type { ChainForest } from '../../chain/types';
import { createLogger } from '../../logger';
import type { Colors } from '../colors';
import {
    BrowserEffect,
    flattenForest,
    initialBrowserState,
    reduceBrowserKey,
    renderBrowserScreen,
    toBrowserKey,
} from './BrowserState';

const ENTER_ALTERNATE_SCREEN = '\x1b[?1049h';
const LEAVE_ALTERNATE_SCREEN = '\x1b[?1049l';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';
const CLEAR_SCREEN = '\x1b[2J\x1b[H';

const logger = createLogger('browser');

export type BrowserInput = NodeJS.ReadableStream & {
    isTTY?: boolean;
    isRaw?: boolean;
    setRawMode?: (mode: boolean) => unknown;
};

export type BrowserOutput = NodeJS.WritableStream & {
    columns?: number;
    rows?: number;
};

export interface BrowserStreams {
    input: BrowserInput;
    output: BrowserOutput;
}

export interface BrowserOptions {
    version?: string;
    colors?: Colors;
}

/**
 * Runs the interactive browser until the user quits, asks for text mode or the
 * input ends. The terminal is restored before the returned promise settles.
 */
export function runBrowser(
    forest: ChainForest,
    { input, output }: BrowserStreams,
    options: BrowserOptions = {},
): Promise<Exclude<BrowserEffect, 'none'>> {
    const items = flattenForest(forest);
    let state = initialBrowserState();

    return new Promise((resolve, reject) => {
        const wasRaw = input.isRaw ?? false;

        const draw = (): void => {
            const size = { columns: output.columns ?? 80, rows: output.rows ?? 24 };
            output.write(CLEAR_SCREEN + renderBrowserScreen(items, state, size, options).join('\r\n'));
        };

        const onKeypress = (sequence: string | undefined, key?: { name?: string; ctrl?: boolean }): void => {
            const transition = reduceBrowserKey(state, toBrowserKey(sequence, key), items.length);
            state = transition.state;
            if (transition.effect === 'none') {
                draw();
                return;
            }
            cleanup();
            logger.debug('Browser closed', { effect: transition.effect });
            resolve(transition.effect);
        };

        const onEnd = (): void => {
            cleanup();
            logger.debug('Browser input ended');
            resolve('quit');
        };

        const onError = (error: Error): void => {
            cleanup();
            reject(error);
        };

        const cleanup = (): void => {
            input.off('keypress', onKeypress);
            input.off('end', onEnd);
            input.off('error', onError);
            output.off('resize', draw);
            if (input.isTTY && input.setRawMode) {
                input.setRawMode(wasRaw);
            }
            input.pause();
            output.write(SHOW_CURSOR + LEAVE_ALTERNATE_SCREEN);
        };

        readline.emitKeypressEvents(input);
        if (input.isTTY && input.setRawMode) {
            input.setRawMode(true);
        }
        input.on('keypress', onKeypress);
        input.once('end', onEnd);
        input.once('error', onError);
        output.on('resize', draw);
        input.resume();

        output.write(ENTER_ALTERNATE_SCREEN + HIDE_CURSOR);
        draw();
    });
}
