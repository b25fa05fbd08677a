import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createTestMux, FIXED_STAMP_TIME, type TestMux } from '../test-utils/index.js'

describe('printException', () => {
  let test: TestMux

  beforeEach(() => {
    vi.useFakeTimers()
    test = createTestMux()
    test.mux.write('ready\n')
  })

  afterEach(async () => {
    const closing = test.mux.close()
    await vi.advanceTimersByTimeAsync(100)
    await closing
    vi.useRealTimers()
  })

  it('prints the stack as its own error block', async () => {
    const error = new Error('kaput')
    error.stack = 'Error: kaput\n    at here'

    test.mux.printException(error)
    await vi.advanceTimersByTimeAsync(40)

    expect(test.stderr.text()).toBe(
      `\n+    mux|${FIXED_STAMP_TIME}| Exception Details \n+    Error: kaput\n+        at here\n+    \n`
    )
    expect(test.mux.err.headerMessage).toBe('')
  })

  it('uses the given header message and wraps thrown values', async () => {
    test.mux.printException('not an error', 'Startup')
    await vi.advanceTimersByTimeAsync(40)

    expect(test.stderr.text()).toMatch(
      new RegExp(`^\\n\\+    mux\\|${FIXED_STAMP_TIME}\\| Startup \\n\\+    Error: not an error\\n`)
    )
  })
})
