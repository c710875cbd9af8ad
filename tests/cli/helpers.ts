import { PassThrough } from 'node:stream';
import type { CliEnvironment } from '../../src/cli';
import { plainColors } from '../../src/display';

export interface CapturedEnvironment extends CliEnvironment {
    out: string[];
    err: string[];
}

export function testEnvironment(overrides: Partial<CliEnvironment> = {}): CapturedEnvironment {
    const out: string[] = [];
    const err: string[] = [];
    return {
        out,
        err,
        stdout: text => out.push(text),
        stderr: text => err.push(text),
        input: new PassThrough(),
        output: new PassThrough(),
        env: { CERT_TREE_LOG_LEVEL: 'silent' },
        platform: 'linux',
        colors: plainColors(),
        now: new Date('2025-06-15T12:00:00Z'),
        fetchChain: async () => {
            throw new Error('unexpected network access');
        },
        ...overrides,
    };
}
