// wcag-contrast ships no typings; only the parts used here are declared.
declare module 'wcag-contrast' {
    /** Contrast ratio (1-21) between two `#rrggbb` colours. */
    export function hex(a: string, b: string): number;
}
