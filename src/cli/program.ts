/**
 * cert-tree command line interface
 *
 * @module cli/program
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Argument, Command, CommanderError } from 'commander';
import { z } from 'zod';

import { decodeCertificateChain } from '../certificate/CertificateDecoder';
import type { CertificateRecord } from '../certificate/types';
import { CertificateError, CertificateErrorCode } from '../CertificateError';
import { buildCertificateForest } from '../chain';
import { AppConfig, loadConfig } from '../config';
import { Colors, defaultColors } from '../display/colors';
import { renderCertificateDetails } from '../display/DetailsRenderer';
import { renderChainText } from '../display/TextRenderer';
import { BrowserInput, BrowserOutput, runBrowser } from '../display/browser/TerminalBrowser';
import { FetchChainOptions, fetchCertificateChain, loadCertificateFile } from '../io/CertificateSource';
import { createLogger, setLogLevel } from '../logger';
import { generateCompletion, installCompletion, isShell, SHELLS } from './completion';

const PackageJsonSchema = z.object({ version: z.string() });

const logger = createLogger('cli');

export interface CliOptions {
    file?: string;
    url?: string;
    interactive?: boolean;
    text?: boolean;
}

/**
 * Process surroundings of a CLI run, replaceable in tests
 */
export interface CliEnvironment {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
    input: BrowserInput;
    output: BrowserOutput;
    env: NodeJS.ProcessEnv;
    platform: NodeJS.Platform;
    colors: Colors;
    /** Reference time for validity classification */
    now?: Date;
    fetchChain: (url: string, options: FetchChainOptions) => Promise<CertificateRecord[]>;
}

export function getVersion(): string {
    // src/cli and dist/cli are both two levels below the package root
    const pkgPath = join(__dirname, '..', '..', 'package.json');
    if (existsSync(pkgPath)) {
        const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
        if (parsed.success) {
            return parsed.data.version;
        }
    }
    return '0.0.0';
}

function resolveEnvironment(overrides: Partial<CliEnvironment>): CliEnvironment {
    return {
        stdout: overrides.stdout ?? (text => process.stdout.write(text)),
        stderr: overrides.stderr ?? (text => process.stderr.write(text)),
        input: overrides.input ?? process.stdin,
        output: overrides.output ?? process.stdout,
        env: overrides.env ?? process.env,
        platform: overrides.platform ?? process.platform,
        colors: overrides.colors ?? defaultColors,
        now: overrides.now,
        fetchChain: overrides.fetchChain ?? fetchCertificateChain,
    };
}

function writeLines(write: (text: string) => void, lines: string[]): void {
    write(lines.map(line => `${line}\n`).join(''));
}

async function inspect(options: CliOptions, config: AppConfig, io: CliEnvironment, version: string): Promise<void> {
    let records: CertificateRecord[];
    if (options.file) {
        if (options.url) {
            logger.info('Both --file and --url given, using the file', { file: options.file });
        }
        records = decodeCertificateChain(await loadCertificateFile(options.file));
    } else if (options.url) {
        records = await io.fetchChain(options.url, { timeoutMs: config.timeoutMs });
    } else {
        return;
    }

    if (records.length === 0) {
        throw new CertificateError(CertificateErrorCode.NotFound, 'no certificates in input');
    }

    let interactive = Boolean(options.interactive) && !options.text;
    if (interactive && !io.input.isTTY) {
        logger.warn('Input is not a terminal, falling back to text output');
        interactive = false;
    }

    const forest = buildCertificateForest(records, { now: io.now, expiringSoonDays: config.expiringSoonDays });

    if (interactive) {
        const effect = await runBrowser(forest, { input: io.input, output: io.output }, { version, colors: io.colors });
        if (effect === 'text-mode') {
            writeLines(io.stdout, renderChainText(forest, io.colors));
        }
        return;
    }

    if (records.length === 1) {
        writeLines(io.stdout, renderCertificateDetails(records[0]));
        return;
    }

    writeLines(io.stdout, renderChainText(forest, io.colors));
}

/**
 * Builds the commander program. Output goes through `io`; errors propagate to the caller.
 */
export function createProgram(config: AppConfig, io: CliEnvironment): Command {
    const version = getVersion();
    const program = new Command();

    program
        .name('cert-tree')
        .description('X.509 certificate chain inspection utility')
        .version(version)
        .option('-f, --file <path>', 'Certificate file path (PEM or DER)')
        .option('-U, --url <url>', 'Certificate URL')
        .option('-i, --interactive', 'Interactive terminal browser')
        .option('-t, --text', 'Force text output mode (non-interactive)')
        .configureOutput({
            writeOut: text => io.stdout(text),
            writeErr: text => io.stderr(text),
            outputError: (text, write) => write(io.colors.red(text)),
        })
        .exitOverride()
        .action(async (options: CliOptions) => {
            if (!options.file && !options.url) {
                program.outputHelp();
                return;
            }
            await inspect(options, config, io, version);
        });

    program
        .command('completion')
        .description('Generate shell completion scripts')
        .addArgument(new Argument('[shell]', 'target shell').choices(SHELLS))
        .option('--install', 'Install the script for the given or detected shell')
        .action(async (shell: string | undefined, options: { install?: boolean }) => {
            const target = shell !== undefined && isShell(shell) ? shell : undefined;
            if (options.install) {
                const lines = await installCompletion(program, target, { env: io.env, platform: io.platform });
                writeLines(io.stdout, lines);
                return;
            }
            if (!target) {
                throw new Error(`missing shell, expected one of: ${SHELLS.join(', ')}`);
            }
            writeLines(io.stdout, [generateCompletion(target, program)]);
        });

    return program;
}

/**
 * Runs the CLI with user arguments (without the node and script paths) and
 * resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], overrides: Partial<CliEnvironment> = {}): Promise<number> {
    const io = resolveEnvironment(overrides);

    try {
        const config = loadConfig(io.env);
        setLogLevel(config.logLevel);
        await createProgram(config, io).parseAsync([...argv], { from: 'user' });
        return 0;
    } catch (error) {
        if (error instanceof CommanderError) {
            // commander has already written its own message
            return error.exitCode;
        }
        const message = error instanceof Error ? error.message : String(error);
        logger.debug('Command failed', { error: message });
        io.stderr(io.colors.red(`error: ${message}\n`));
        return 1;
    }
}
