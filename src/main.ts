#!/usr/bin/env node
import App from './App.js'
import { AppLog } from './AppLog.js'
import { KeyboardInput } from './input/KeyboardInput.js'
import { TerminalSurface } from './render/TerminalSurface.js'

async function main(): Promise<void> {
    const stdout = process.stdout
    const surface = new TerminalSurface({
        columns: stdout.columns ?? 80,
        rows: stdout.rows ?? 24,
        write: chunk => { stdout.write(chunk) },
        color: stdout.hasColors?.(2 ** 24) ?? false
    })
    const onResize = (): void => surface.resize(stdout.columns, stdout.rows)
    stdout.on('resize', onResize)

    const input = new KeyboardInput(process.stdin)
    try {
        const app = new App({ surface, input })
        await app.run()
    } catch (err) {
        input.close()
        throw err
    } finally {
        stdout.off('resize', onResize)
        surface.dispose()
    }
}

main().catch((err: unknown) => {
    AppLog.error(err instanceof Error ? err.message : String(err))
    process.exitCode = 1
})
