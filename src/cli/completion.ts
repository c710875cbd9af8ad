/**
 * Shell completion scripts generated from the commander program definition
 *
 * @module cli/completion
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import type { Command, Option } from 'commander';

export const SHELLS = ['bash', 'zsh', 'fish', 'powershell'] as const;

export type Shell = (typeof SHELLS)[number];

/** Options that take a file path as their value */
const FILE_OPTIONS = new Set(['--file']);

interface FlagInfo {
    short?: string;
    long?: string;
    description: string;
    takesValue: boolean;
    isFile: boolean;
}

export function isShell(value: string): value is Shell {
    return SHELLS.some(shell => shell === value);
}

function collectFlags(program: Command): FlagInfo[] {
    const flags = program.options.map(
        (option: Option): FlagInfo => ({
            short: option.short,
            long: option.long,
            description: option.description,
            takesValue: option.required || option.optional,
            isFile: option.long !== undefined && FILE_OPTIONS.has(option.long),
        }),
    );
    flags.push({ short: '-h', long: '--help', description: 'display help for command', takesValue: false, isFile: false });
    return flags;
}

function flagWords(flags: FlagInfo[]): string[] {
    return flags.flatMap(flag => [flag.short, flag.long].filter((word): word is string => word !== undefined));
}

function bashScript(name: string, flags: FlagInfo[], subcommands: string[]): string {
    const fn = `_${name.replace(/[^A-Za-z0-9_]/g, '_')}`;
    const fileFlags = flags
        .filter(flag => flag.isFile)
        .flatMap(flag => [flag.short, flag.long].filter((word): word is string => word !== undefined));
    const lines = [
        `# bash completion for ${name}`,
        `${fn}() {`,
        '    local cur prev',
        '    cur="${COMP_WORDS[COMP_CWORD]}"',
        '    prev="${COMP_WORDS[COMP_CWORD-1]}"',
        '    case "${prev}" in',
    ];
    if (fileFlags.length > 0) {
        lines.push(
            `        ${fileFlags.join('|')})`,
            '            COMPREPLY=( $(compgen -f -- "${cur}") )',
            '            return 0',
            '            ;;',
        );
    }
    lines.push(
        '        completion)',
        `            COMPREPLY=( $(compgen -W "${SHELLS.join(' ')}" -- "\${cur}") )`,
        '            return 0',
        '            ;;',
        '    esac',
        `    COMPREPLY=( $(compgen -W "${[...flagWords(flags), ...subcommands].join(' ')}" -- "\${cur}") )`,
        '}',
        `complete -F ${fn} ${name}`,
    );
    return lines.join('\n');
}

function zshDescription(text: string): string {
    return text.replace(/'/g, `'\\''`).replace(/([[\]])/g, '\\$1');
}

function zshScript(name: string, flags: FlagInfo[], subcommands: string[]): string {
    const fn = `_${name.replace(/[^A-Za-z0-9_]/g, '_')}`;
    const specs = flags.map(flag => {
        const words = [flag.short, flag.long].filter((word): word is string => word !== undefined);
        const action = flag.takesValue ? `:value:${flag.isFile ? '_files' : ''}` : '';
        const spec = `[${zshDescription(flag.description)}]${action}`;
        return words.length > 1 ? `'(${words.join(' ')})'{${words.join(',')}}'${spec}'` : `'${words[0]}${spec}'`;
    });
    specs.push(`'1: :(${subcommands.join(' ')})'`, `'2: :(${SHELLS.join(' ')})'`);
    return [
        `#compdef ${name}`,
        '',
        `${fn}() {`,
        '    _arguments -s \\',
        ...specs.map((spec, index) => `        ${spec}${index < specs.length - 1 ? ' \\' : ''}`),
        '}',
        '',
        `${fn} "$@"`,
    ].join('\n');
}

function fishDescription(text: string): string {
    return text.replace(/'/g, `\\'`);
}

function fishScript(name: string, flags: FlagInfo[], program: Command): string {
    const lines = [`# fish completion for ${name}`];
    for (const flag of flags) {
        let line = `complete -c ${name}`;
        if (flag.short) {
            line += ` -s ${flag.short.slice(1)}`;
        }
        if (flag.long) {
            line += ` -l ${flag.long.slice(2)}`;
        }
        line += ` -d '${fishDescription(flag.description)}'`;
        if (flag.takesValue) {
            line += flag.isFile ? ' -r -F' : ' -r';
        }
        lines.push(line);
    }
    for (const command of program.commands) {
        lines.push(
            `complete -c ${name} -n '__fish_use_subcommand' -a ${command.name()} -d '${fishDescription(command.description())}'`,
        );
    }
    lines.push(`complete -c ${name} -n '__fish_seen_subcommand_from completion' -a '${SHELLS.join(' ')}'`);
    return lines.join('\n');
}

function powershellScript(name: string, flags: FlagInfo[], subcommands: string[]): string {
    const candidates = [...flagWords(flags), ...subcommands].map(word => `'${word}'`).join(', ');
    return [
        `Register-ArgumentCompleter -Native -CommandName '${name}' -ScriptBlock {`,
        '    param($wordToComplete, $commandAst, $cursorPosition)',
        `    $candidates = @(${candidates})`,
        '    $candidates | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {',
        "        [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)",
        '    }',
        '}',
    ].join('\n');
}

/**
 * Builds the completion script for `shell` from the options and subcommands of `program`
 */
export function generateCompletion(shell: Shell, program: Command): string {
    const name = program.name();
    const flags = collectFlags(program);
    const subcommands = program.commands.map(command => command.name());

    switch (shell) {
        case 'bash':
            return bashScript(name, flags, subcommands);
        case 'zsh':
            return zshScript(name, flags, subcommands);
        case 'fish':
            return fishScript(name, flags, program);
        case 'powershell':
            return powershellScript(name, flags, subcommands);
    }
}

/**
 * Guesses the user's shell from `$SHELL`
 */
export function detectShell(env: NodeJS.ProcessEnv = process.env): Shell | undefined {
    const shellPath = env.SHELL;
    if (!shellPath) {
        return undefined;
    }
    const base = shellPath.split('/').pop() ?? '';
    if (base.includes('zsh')) return 'zsh';
    if (base.includes('fish')) return 'fish';
    if (base.includes('bash')) return 'bash';
    if (base.includes('pwsh') || base.includes('powershell')) return 'powershell';
    return undefined;
}

/**
 * Conventional install location of a completion script, `undefined` for PowerShell
 */
export function getCompletionPath(
    shell: Shell,
    name: string,
    env: NodeJS.ProcessEnv = process.env,
    platform: NodeJS.Platform = process.platform,
): string | undefined {
    const home = env.HOME ?? homedir();
    switch (shell) {
        case 'bash':
            return platform === 'darwin'
                ? join('/usr/local/etc/bash_completion.d', name)
                : join(home, '.local', 'share', 'bash-completion', 'completions', name);
        case 'zsh':
            return join(home, '.zsh', 'completion', `_${name}`);
        case 'fish':
            return join(home, '.config', 'fish', 'completions', `${name}.fish`);
        case 'powershell':
            return undefined;
    }
}

function followUp(shell: Shell, path: string): string[] {
    switch (shell) {
        case 'bash':
            return ['Restart your shell or run:', `  source ${path}`];
        case 'zsh':
            return [
                'Make sure the completion directory is on your fpath, e.g. in ~/.zshrc:',
                `  fpath=(${dirname(path)} $fpath)`,
                '  autoload -Uz compinit && compinit',
            ];
        case 'fish':
            return ['Completions are loaded automatically by new fish sessions.'];
        case 'powershell':
            return [];
    }
}

export interface InstallOptions {
    env?: NodeJS.ProcessEnv;
    platform?: NodeJS.Platform;
}

/**
 * Writes the completion script to its conventional location.
 * Returns the lines to show to the user.
 */
export async function installCompletion(
    program: Command,
    shell: Shell | undefined,
    { env = process.env, platform = process.platform }: InstallOptions = {},
): Promise<string[]> {
    const target = shell ?? detectShell(env);
    if (!target) {
        throw new Error(`could not detect shell from $SHELL, specify one of: ${SHELLS.join(', ')}`);
    }

    const path = getCompletionPath(target, program.name(), env, platform);
    if (!path) {
        return [
            'PowerShell completions have no standard install location.',
            `Add the output of \`${program.name()} completion powershell\` to your $PROFILE.`,
        ];
    }

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${generateCompletion(target, program)}\n`);
    return [`Installed ${target} completions to ${path}`, ...followUp(target, path)];
}
