import { describe, it, expect, afterEach } from 'vitest'
import { createTestMux, FIXED_STAMP_TIME, type TestMux } from '../test-utils/index.js'
import { createScope, runScoped, setting } from './scopes.js'

describe('runScoped', () => {
  it('restores after a synchronous body', () => {
    const calls: string[] = []
    const result = runScoped(
      () => {
        calls.push('enter')
        return () => calls.push('exit')
      },
      () => {
        calls.push('body')
        return 7
      }
    )

    expect(result).toBe(7)
    expect(calls).toEqual(['enter', 'body', 'exit'])
  })

  it('restores when the body throws', () => {
    const target = { on: false }
    const scope = setting(target, 'on', true)

    expect(() =>
      scope(() => {
        expect(target.on).toBe(true)
        throw new Error('inside')
      })
    ).toThrow('inside')
    expect(target.on).toBe(false)
  })

  it('keeps an async switch active until the promise settles', async () => {
    const target = { on: false }
    const scope = setting(target, 'on', true)
    let seen = false

    const pending = scope(async () => {
      await Promise.resolve()
      seen = target.on
      return 'done'
    })

    expect(target.on).toBe(true)
    await expect(pending).resolves.toBe('done')
    expect(seen).toBe(true)
    expect(target.on).toBe(false)
  })

  it('restores when an async body rejects', async () => {
    const target = { on: false }

    await expect(
      setting(target, 'on', true)(async () => {
        await Promise.resolve()
        throw new Error('rejected')
      })
    ).rejects.toThrow('rejected')
    expect(target.on).toBe(false)
  })

  it('nests switches and restores each level', () => {
    const target = { value: 'a' }
    const outer = setting(target, 'value', 'b')
    const inner = setting(target, 'value', 'c')

    outer(() => {
      inner(() => expect(target.value).toBe('c'))
      expect(target.value).toBe('b')
    })
    expect(target.value).toBe('a')
  })

  it('builds scopes from an entry function', () => {
    let depth = 0
    const scope = createScope(() => {
      depth++
      return () => {
        depth--
      }
    })

    expect(scope(() => depth)).toBe(1)
    expect(depth).toBe(0)
  })
})

describe('ScopeSwitches', () => {
  let test: TestMux

  afterEach(async () => {
    await test.mux.close()
  })

  it('shows user-scoped output in user mode and logs the rest', () => {
    test = createTestMux({ userMode: true })
    const { mux, stdout } = test

    mux.write('hidden\n')
    mux.scopes.user(() => mux.write('shown\n'))

    expect(stdout.text()).toBe('shown\n')
    expect(mux.out.user).toBe(false)
  })

  it('keeps file-only output off the screen', () => {
    test = createTestMux()
    const { mux, stdout } = test

    mux.scopes.fileOnly(() => mux.write('log only\n'))
    mux.write('both\n')

    expect(stdout.text()).toBe('both\n')
  })

  it('sets role flags on the Output Sink', () => {
    test = createTestMux()
    const { mux } = test

    mux.scopes.warn(() => expect(mux.out.warn).toBe(true))
    mux.scopes.error(() => expect(mux.out.error).toBe(true))
    mux.scopes.userErr(() => expect(mux.err.user).toBe(true))

    expect(mux.out.warn).toBe(false)
    expect(mux.out.error).toBe(false)
    expect(mux.err.user).toBe(false)
  })

  it('swaps the prefix', () => {
    test = createTestMux()
    const { mux } = test

    const stamped = mux.scopes.pre('job')(() => mux.stamp())

    expect(stamped).toBe(`job|${FIXED_STAMP_TIME}|`)
    expect(mux.stamp()).toBe(`mux|${FIXED_STAMP_TIME}|`)
  })

  it('installs keyword maps for the duration of the body', () => {
    test = createTestMux()
    const { mux } = test

    mux.scopes.highlight(['disk'], ['ok'])(() => {
      expect(mux.out.highWords).toEqual({ disk: null })
      expect(mux.out.lowWords).toEqual({ ok: null })
    })
    mux.scopes.highmap({ disk: '\u001b[31m' })(() => {
      expect(mux.out.highWords).toEqual({ disk: '\u001b[31m' })
      expect(mux.out.lowWords).toEqual({})
    })

    expect(mux.out.highWords).toEqual({})
    expect(mux.out.lowWords).toEqual({})
  })

  it('swaps the error header message', () => {
    test = createTestMux()
    const { mux } = test

    mux.scopes.errHeader(' Failure ')(() => expect(mux.err.headerMessage).toBe(' Failure '))
    expect(mux.err.headerMessage).toBe('')
  })

  it('runs the body unchanged in the none scope', () => {
    test = createTestMux()

    expect(test.mux.scopes.none(() => 'same')).toBe('same')
  })
})
