/**
 * Formatted console output helpers.
 * Everything goes to stdout, diagnostics included.
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.log(`Advertencia: ${message}`);
}

export function error(message: string): void {
    console.log(`Error: ${message}`);
}
