import { describe, it, expect } from 'vitest'
import { formatHud, formatTimeScale } from './Hud.js'

describe('Hud', () => {
    describe('formatTimeScale', () => {
        it('should pick hours below a day', () => {
            expect(formatTimeScale(3600)).toBe('1.0 hours')
            expect(formatTimeScale(43200)).toBe('12.0 hours')
        })

        it('should pick days from a day up to a year', () => {
            expect(formatTimeScale(86400)).toBe('1.0 days')
            expect(formatTimeScale(640000)).toBe('7.4 days')
            expect(formatTimeScale(20480000)).toBe('237.0 days')
        })

        it('should pick years at the upper bound', () => {
            expect(formatTimeScale(31536000)).toBe('1.0 years')
        })
    })

    describe('formatHud', () => {
        it('should produce the four status lines', () => {
            expect(formatHud({ timeScale: 640000, paused: false }, 'S2', 12345678, 1.1)).toEqual([
                'Time Scale: 7.4 days/frame',
                'S2 Velocity: 12,346 km/s',
                'Zoom: 1.1x',
                'RUNNING'
            ])
        })

        it('should show the paused state', () => {
            const lines = formatHud({ timeScale: 3600, paused: true }, 'S2', 999, 0.5)
            expect(lines[1]).toBe('S2 Velocity: 1 km/s')
            expect(lines[2]).toBe('Zoom: 0.5x')
            expect(lines[3]).toBe('PAUSED')
        })
    })
})
