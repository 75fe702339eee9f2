import { describe, it, expect, vi } from 'vitest'
import { PassThrough } from 'node:stream'
import { KeyboardInput, mapKey } from './KeyboardInput.js'

function flush(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve))
}

describe('mapKey', () => {
    it('should map the control keys', () => {
        expect(mapKey({ name: 'space' })).toBe('toggle-pause')
        expect(mapKey({ name: 'up' })).toBe('zoom-in')
        expect(mapKey({ name: 'down' })).toBe('zoom-out')
        expect(mapKey({ name: 'left' })).toBe('decrease-time-scale')
        expect(mapKey({ name: 'right' })).toBe('increase-time-scale')
        expect(mapKey({ name: 'a' })).toBe('pan-left')
        expect(mapKey({ name: 'r' })).toBe('reset-view')
    })

    it('should quit on q, escape and Ctrl-C', () => {
        expect(mapKey({ name: 'q' })).toBe('quit')
        expect(mapKey({ name: 'escape' })).toBe('quit')
        expect(mapKey({ name: 'c', ctrl: true })).toBe('quit')
    })

    it('should ignore unmapped keys and other Ctrl chords', () => {
        expect(mapKey({ name: 'x' })).toBeUndefined()
        expect(mapKey({ name: 'q', ctrl: true })).toBeUndefined()
        expect(mapKey({})).toBeUndefined()
    })
})

describe('KeyboardInput', () => {
    it('should emit events for keys read from the stream', async () => {
        const stream = new PassThrough()
        const input = new KeyboardInput(stream)
        const listener = vi.fn()
        input.onEvent(listener)

        stream.write(' ')
        stream.write('\x1b[C')
        stream.write('x')
        stream.write('q')
        await flush()

        expect(listener.mock.calls).toEqual([['toggle-pause'], ['increase-time-scale'], ['quit']])
        input.close()
    })

    it('should stop emitting after close', async () => {
        const stream = new PassThrough()
        const input = new KeyboardInput(stream)
        const listener = vi.fn()
        input.onEvent(listener)

        input.close()
        stream.write(' ')
        await flush()

        expect(listener).not.toHaveBeenCalled()
    })

    it('should toggle raw mode on a TTY', () => {
        const setRawMode = vi.fn()
        const stream = Object.assign(new PassThrough(), { isTTY: true, setRawMode })

        const input = new KeyboardInput(stream)
        expect(setRawMode).toHaveBeenLastCalledWith(true)
        input.close()
        expect(setRawMode).toHaveBeenLastCalledWith(false)
    })
})
