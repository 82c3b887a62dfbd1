/**
 * CLI Formatting Utility
 *
 * Terminal output for the multistake commands using chalk, boxen and figures.
 * figures and log-symbols fall back to ASCII on terminals without Unicode.
 */

import chalk from 'chalk';
import boxen, { Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,

    pointer: figures.pointer,
    bullet: figures.bullet,

    rocket: '🚀',
    money: '💰',
    lock: '🔒',
    folder: '📁',
    globe: '🌍',
    clock: '⏰',
    pool: '🏊',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow,

    bold: chalk.bold,
    dim: chalk.dim,

    heading: chalk.bold.cyan,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
};

// ==================== BOX STYLES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

export function successBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'green',
        title: title || `${sym.success} Success`,
        titleAlignment: 'center',
    });
}

export function errorBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'red',
        title: title || `${sym.error} Error`,
        titleAlignment: 'center',
    });
}

export function infoBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'blue',
        title: title || `${sym.info} Info`,
        titleAlignment: 'center',
    });
}

// ==================== HEADER ====================

/**
 * One-line boxed title, e.g. "🏊 Multistake · Pools"
 */
export function header(title: string, emoji: string = sym.pool): string {
    const text = c.heading(`${emoji} Multistake · ${title}`);
    return boxen(text, {
        padding: { top: 0, bottom: 0, left: 2, right: 2 },
        borderStyle: 'round',
        borderColor: 'cyan',
    });
}

// ==================== MESSAGES ====================

export function error(msg: string): void {
    console.log(`${sym.error} ${c.error(msg)}`);
}

export function warn(msg: string): void {
    console.log(`${sym.warning} ${c.warning(msg)}`);
}

export function keyValue(key: string, value: string, indent: number = 0): void {
    const pad = ' '.repeat(indent);
    console.log(`${pad}${c.label(key + ':')} ${c.value(value)}`);
}

/**
 * Render a raw 18-decimal amount as a short decimal string.
 */
export function formatAmount(raw: string, decimals: number = 18): string {
    if (!/^\d+$/.test(raw)) return raw;
    const padded = raw.padStart(decimals + 1, '0');
    const whole = padded.slice(0, padded.length - decimals);
    const fraction = padded.slice(padded.length - decimals).slice(0, 6).replace(/0+$/, '');
    return fraction.length > 0 ? `${whole}.${fraction}` : whole;
}

// ==================== DIVIDERS ====================

export function divider(char: string = '─', length: number = 50): void {
    console.log(c.dim(char.repeat(length)));
}

export function newline(): void {
    console.log('');
}

export default {
    sym,
    c,
    successBox,
    errorBox,
    infoBox,
    header,
    error,
    warn,
    keyValue,
    formatAmount,
    divider,
    newline,
};
