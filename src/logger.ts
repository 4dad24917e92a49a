/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when PKBUILD_LOG_JSON=1
 * - Optional file output via PKBUILD_LOG_FILE
 * - Component name on every line
 * - Build correlation (build id, phase, package) propagated through all entries
 *
 * Environment:
 *   PKBUILD_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   PKBUILD_LOG_JSON   = 1 (default: text)
 *   PKBUILD_LOG_FILE   = path (optional, appends)
 *   PKBUILD_DEBUG      = 1 (sets level to debug; DEBUG=1 works too)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

function isTruthy(value: string | undefined): boolean {
    return value === '1' || value === 'true';
}

const envLevel = (process.env.PKBUILD_LOG_LEVEL || 'info').toLowerCase();
const MIN_LEVEL: number = isLogLevel(envLevel) ? LEVEL_ORDER[envLevel] : LEVEL_ORDER.info;
const DEBUG_OVERRIDE = isTruthy(process.env.PKBUILD_DEBUG) || isTruthy(process.env.DEBUG);
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.PKBUILD_LOG_JSON === '1';
const LOG_FILE = process.env.PKBUILD_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Build Correlation Context                                                  */
/* -------------------------------------------------------------------------- */

let _buildId: string = '';
let _phase: string = '';
let _pkg: string = '';

/** Set the active correlation context. Called by the drivers at run start and per phase. */
export function setCorrelation(opts: { buildId?: string; phase?: string; pkg?: string }): void {
    if (opts.buildId !== undefined) _buildId = opts.buildId;
    if (opts.phase !== undefined) _phase = opts.phase;
    if (opts.pkg !== undefined) _pkg = opts.pkg;
}

/** Clear correlation context. Called at run end. */
export function clearCorrelation(): void {
    _buildId = '';
    _phase = '';
    _pkg = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_buildId) entry.build_id = _buildId;
        if (_phase) entry.phase = _phase;
        if (_pkg) entry.pkg = _pkg;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _buildId ? ` [${_buildId.slice(0, 8)}${_pkg ? '/' + _pkg : ''}${_phase ? ':' + _phase : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    // warn and error go to stderr
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try { fs.appendFileSync(LOG_FILE, line + '\n'); } catch { /* ignore */ }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
    };
}
