/**
 * Exit-status contract embedded in every rendered script.
 *
 * The header traps EXIT and a fixed signal set. EXIT writes the real exit
 * code to <job>_STAT; a trapped signal writes 128 + its number and exits
 * with that code. Only the tailer's normal path touches <job>_COMPLETED.
 * SIGKILL, or a foreground command that ignores the signal, leaves neither
 * artifact behind.
 */

import { ExitStatusContractError } from './errors.js';

export interface TrappedSignal {
    name: string;
    number: number;
}

export const TRAPPED_SIGNALS: readonly TrappedSignal[] = [
    { name: 'HUP', number: 1 },
    { name: 'INT', number: 2 },
    { name: 'QUIT', number: 3 },
    { name: 'TERM', number: 15 },
    { name: 'XCPU', number: 24 },
    { name: 'XFSZ', number: 25 }
];

export const SIGNAL_EXIT_BASE = 128;

export const STATUS_SUFFIX = '_STAT';
export const COMPLETED_SUFFIX = '_COMPLETED';

/** Status directory when none is given: wherever the script lives. */
export const SCRIPT_DIR_EXPRESSION = '"$(cd "$(dirname "$0")" && pwd)"';

export const CONTRACT_LINES = {
    exitTrap: 'trap on_exit EXIT',
    signalArithmetic: `local exit_code=$((${SIGNAL_EXIT_BASE} + $1))`,
    statusWrite: 'echo "$1" > "${stat_file}"',
    completion: 'touch "${completed_file}"'
};

export function signalTrapLine(signal: TrappedSignal): string {
    return `trap 'on_signal ${signal.number}' ${signal.name}`;
}

export function signalExitCode(signal: TrappedSignal | number): number {
    return SIGNAL_EXIT_BASE + (typeof signal === 'number' ? signal : signal.number);
}

export function statusFileName(jobName: string): string {
    return `${jobName}${STATUS_SUFFIX}`;
}

export function completedFileName(jobName: string): string {
    return `${jobName}${COMPLETED_SUFFIX}`;
}

export function shellQuote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

export interface HeaderOptions {
    jobName: string;
    /** Directory for the status artifacts; defaults to the script's own directory at run time. */
    statusDir?: string;
    /** Extra text placed after the default header. */
    extendedHeader?: string;
}

export interface TailerOptions {
    /** Extra text run before the completion artifact is written. */
    extendedTailer?: string;
}

function section(title: string): string {
    const rule = '#'.repeat(79);
    return `${rule}\n#   ${title}\n${rule}\n`;
}

function withNewline(text: string): string {
    return text.endsWith('\n') ? text : `${text}\n`;
}

export function buildHeader(options: HeaderOptions): string {
    const statusDir = options.statusDir !== undefined ? shellQuote(options.statusDir) : SCRIPT_DIR_EXPRESSION;

    const lines = [
        '#!/usr/bin/env bash',
        '',
        section(`Header: ${options.jobName}`),
        'set -xuve',
        `job_name_ptrn=${shellQuote(options.jobName)}`,
        `status_dir=${statusDir}`,
        `stat_file="\${status_dir}/\${job_name_ptrn}${STATUS_SUFFIX}"`,
        `completed_file="\${status_dir}/\${job_name_ptrn}${COMPLETED_SUFFIX}"`,
        'rm -f "${completed_file}"',
        '',
        'write_status() {',
        `    ${CONTRACT_LINES.statusWrite}`,
        '}',
        '',
        'on_exit() {',
        '    local exit_code=$?',
        '    write_status "${exit_code}"',
        '}',
        '',
        'on_signal() {',
        `    ${CONTRACT_LINES.signalArithmetic}`,
        '    trap - EXIT',
        '    write_status "${exit_code}"',
        '    exit "${exit_code}"',
        '}',
        '',
        CONTRACT_LINES.exitTrap,
        ...TRAPPED_SIGNALS.map(signalTrapLine),
        ''
    ];

    let header = lines.join('\n');
    if (options.extendedHeader) {
        header += '\n' + section('Extended header') + withNewline(options.extendedHeader);
    }
    return header;
}

export function buildTailer(options: TailerOptions = {}): string {
    let tailer = '\n' + section('Tailer');
    if (options.extendedTailer) {
        tailer += withNewline(options.extendedTailer);
    }
    tailer += [CONTRACT_LINES.completion, 'exit 0', ''].join('\n');
    return tailer;
}

/**
 * Check a script's text for every part of the contract. Signal delivery
 * itself is never exercised here.
 */
export function verifyExitStatusContract(script: string): void {
    const required = [
        CONTRACT_LINES.exitTrap,
        CONTRACT_LINES.signalArithmetic,
        CONTRACT_LINES.statusWrite,
        ...TRAPPED_SIGNALS.map(signalTrapLine)
    ];
    const missing = required.filter(line => !script.includes(line));

    // Completion must come after every trap is installed.
    const completionAt = script.lastIndexOf(CONTRACT_LINES.completion);
    const exitTrapAt = script.indexOf(CONTRACT_LINES.exitTrap);
    if (completionAt === -1 || completionAt < exitTrapAt) {
        missing.push(CONTRACT_LINES.completion);
    }

    if (missing.length > 0) {
        throw new ExitStatusContractError(missing);
    }
}
