/** 24-bit ANSI foreground colour escape */
export function color(r: number, g: number, b: number)
{
    return `\x1b[38;2;${Math.round(r)};${Math.round(g)};${Math.round(b)}m`
}

export const RESET = '\x1b[0m'

export function clamp(x: number, min: number, max: number)
{
    return Math.min(Math.max(x, min), max)
}
