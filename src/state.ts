/**
 * @file state.ts
 * @description Process-wide switches of the system: feature flags, the verbose
 * debug channel, warning emission and fresh name generation. Theories and
 * registries are not kept here; they are values threaded through every call.
 */

import { Warning, WarningKind } from './types';

// Global Flags
const flags = {
    traceExtraction: false,
    printTypes: false,
    quietWarnings: false,
};

export type FlagName = keyof typeof flags;

function isFlagName(name: string): name is FlagName {
    return name in flags;
}

export function setFlag(name: string, value: boolean) {
    if (isFlagName(name)) {
        flags[name] = value;
    } else {
        console.warn(`Attempted to set unknown flag: ${name}`);
    }
}

export function getFlag(name: FlagName): boolean {
    return flags[name];
}

export function resetFlags() {
    flags.traceExtraction = false;
    flags.printTypes = false;
    flags.quietWarnings = false;
}

// Debugging Utilities
let _debug_verbose_flag = false;

export function setDebugVerbose(value: boolean): void {
    _debug_verbose_flag = value;
}

export function getDebugVerbose(): boolean {
    return _debug_verbose_flag;
}

export function consoleLog(message?: unknown, ...optionalParams: unknown[]): void {
    if (_debug_verbose_flag) {
        console.log("[VERBOSE]", message, ...optionalParams);
    }
}

/**
 * Records a non-fatal diagnostic in `sink` and echoes it unless
 * `quietWarnings` is set.
 */
export function emitWarning(sink: Warning[], kind: WarningKind, message: string): void {
    sink.push({ kind, message });
    if (!flags.quietWarnings) {
        console.warn(`Warning (${kind}): ${message}`);
    }
}

// Fresh name generation

/**
 * Returns `baseName` if unused, otherwise the first `baseName_<n>` not in `used`.
 * The chosen name is added to `used`.
 */
export function variantName(baseName: string, used: Set<string>): string {
    let uniqueName = baseName;
    let suffix = 1;
    while (used.has(uniqueName)) {
        uniqueName = `${baseName}_${suffix++}`;
    }
    used.add(uniqueName);
    return uniqueName;
}

/**
 * Resets flags and the verbose switch to their initial configuration.
 */
export function resetState() {
    resetFlags();
    setDebugVerbose(false);
}
