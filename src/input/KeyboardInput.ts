import * as readline from 'node:readline'
import type { InputEvent, InputSource } from '../ECS/SimulationController.js'

/** The subset of readline's keypress info the key map looks at */
export interface KeyPress {
    name?: string
    ctrl?: boolean
}

const KEY_MAP = new Map<string, InputEvent>([
    ['space', 'toggle-pause'],
    ['up', 'zoom-in'],
    ['down', 'zoom-out'],
    ['left', 'decrease-time-scale'],
    ['right', 'increase-time-scale'],
    ['w', 'pan-up'],
    ['a', 'pan-left'],
    ['s', 'pan-down'],
    ['d', 'pan-right'],
    ['r', 'reset-view'],
    ['q', 'quit'],
    ['escape', 'quit']
])

export function mapKey(key: KeyPress): InputEvent | undefined {
    if (key.ctrl && key.name === 'c') return 'quit'
    if (key.ctrl || key.name === undefined) return undefined
    return KEY_MAP.get(key.name)
}

/** A readable key stream; TTYs are switched to raw mode while attached */
export type KeyStream = NodeJS.ReadableStream & {
    isTTY?: boolean
    setRawMode?: (mode: boolean) => unknown
}

/**
 * Keyboard input from a TTY stream in raw mode.
 */
export class KeyboardInput implements InputSource {
    private listeners: Array<(event: InputEvent) => void> = []
    private readonly onKeypress = (_str: string | undefined, key: KeyPress | undefined): void => {
        if (!key) return
        const event = mapKey(key)
        if (event === undefined) return
        for (const listener of this.listeners) listener(event)
    }

    constructor(private stdin: KeyStream = process.stdin) {
        readline.emitKeypressEvents(stdin)
        if (stdin.isTTY) stdin.setRawMode?.(true)
        stdin.on('keypress', this.onKeypress)
        stdin.resume()
    }

    onEvent(listener: (event: InputEvent) => void): void {
        this.listeners.push(listener)
    }

    close(): void {
        this.stdin.off('keypress', this.onKeypress)
        if (this.stdin.isTTY) this.stdin.setRawMode?.(false)
        this.stdin.pause()
    }
}
