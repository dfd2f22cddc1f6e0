import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { GenerationClient } from './generation-client.js'
import { FALLBACK_MESSAGES, GENERIC_FALLBACK } from './fallback.js'
import type { GenerationBackend, GenerationRequest } from './providers.js'

function fakeBackend(impl: (request: GenerationRequest) => Promise<string>) {
    const dispatches: number[] = []
    const generate = vi.fn(async (request: GenerationRequest) => {
        dispatches.push(Date.now())
        return impl(request)
    })
    const backend: GenerationBackend = { name: 'fake', generate }
    return { backend, generate, dispatches }
}

describe('GenerationClient', () => {
    beforeEach(() => {
        vi.useFakeTimers()
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    describe('unconfigured', () => {
        it('returns the keyword fallback with no network activity', async () => {
            const fetchSpy = vi.spyOn(globalThis, 'fetch')
            const client = new GenerationClient(null)

            const first = await client.generate('I have been feeling sad all week')
            const second = await client.generate('I have been feeling sad all week')

            expect(first).toEqual({
                text: FALLBACK_MESSAGES.sadness,
                source: 'fallback',
                reason: 'unconfigured',
                provider: 'local-fallback',
            })
            expect(second).toEqual(first)
            expect(fetchSpy).not.toHaveBeenCalled()
            expect(client.configured).toBe(false)
        })
    })

    describe('attempt loop', () => {
        it('returns trimmed model text on the first non-empty answer', async () => {
            const { backend, generate } = fakeBackend(async () => '  You are not alone in this.  \n')
            const client = new GenerationClient(backend)

            const result = await client.generate('prompt', { temperature: 0.4 })

            expect(result).toEqual({ text: 'You are not alone in this.', source: 'llm', provider: 'fake' })
            expect(generate).toHaveBeenCalledWith({
                prompt: 'prompt',
                temperature: 0.4,
                maxOutputTokens: 500,
                topP: 0.9,
            })
        })

        it('defaults the temperature to 0.7', async () => {
            const { backend, generate } = fakeBackend(async () => 'ok then')
            await new GenerationClient(backend).generate('prompt')
            expect(generate.mock.calls[0][0].temperature).toBe(0.7)
        })

        it('retries an empty answer', async () => {
            const answers = ['   ', 'Second time lucky.']
            const { backend, generate } = fakeBackend(async () => answers.shift() ?? '')
            const client = new GenerationClient(backend)

            const promise = client.generate('prompt')
            await vi.runAllTimersAsync()

            expect(await promise).toMatchObject({ text: 'Second time lucky.', source: 'llm' })
            expect(generate).toHaveBeenCalledTimes(2)
        })

        it('falls back after every attempt throws, backing off 1s then 2s', async () => {
            const { backend, generate, dispatches } = fakeBackend(async () => {
                throw new Error('503 upstream unavailable')
            })
            const client = new GenerationClient(backend, { maxRetries: 3 })

            const promise = client.generate('I am so worried about my results')
            await vi.runAllTimersAsync()
            const result = await promise

            expect(generate).toHaveBeenCalledTimes(3)
            expect(dispatches[1] - dispatches[0]).toBe(1000)
            expect(dispatches[2] - dispatches[1]).toBe(2000)
            expect(result).toEqual({
                text: FALLBACK_MESSAGES.fear,
                source: 'fallback',
                reason: 'exhausted',
                provider: 'local-fallback',
            })
        })

        it('honours a per-call attempt budget', async () => {
            const { backend, generate } = fakeBackend(async () => '')
            const client = new GenerationClient(backend)

            const promise = client.generate('nothing to match here', { maxRetries: 1 })
            await vi.runAllTimersAsync()

            expect((await promise).text).toBe(GENERIC_FALLBACK)
            expect(generate).toHaveBeenCalledTimes(1)
        })
    })

    describe('rate gate', () => {
        it('spaces two back-to-back calls by at least the minimum interval', async () => {
            const { backend, dispatches } = fakeBackend(async () => 'fine')
            const client = new GenerationClient(backend, { minIntervalMs: 1000 })

            await client.generate('first')
            const second = client.generate('second')
            await vi.advanceTimersByTimeAsync(1000)
            await second

            expect(dispatches).toHaveLength(2)
            expect(dispatches[1] - dispatches[0]).toBeGreaterThanOrEqual(1000)
        })

        it('queues overlapping callers one interval apart', async () => {
            const { backend, dispatches } = fakeBackend(async () => 'fine')
            const client = new GenerationClient(backend, { minIntervalMs: 1000 })

            const all = Promise.all([client.generate('a'), client.generate('b'), client.generate('c')])
            await vi.runAllTimersAsync()
            await all

            expect(dispatches[1] - dispatches[0]).toBe(1000)
            expect(dispatches[2] - dispatches[1]).toBe(1000)
        })

        it('does not wait when the interval has already passed', async () => {
            const { backend, dispatches } = fakeBackend(async () => 'fine')
            const client = new GenerationClient(backend, { minIntervalMs: 1000 })

            await client.generate('first')
            vi.advanceTimersByTime(5000)
            await client.generate('second')

            expect(dispatches[1] - dispatches[0]).toBe(5000)
        })
    })

    describe('checkHealth', () => {
        it('reports an unconfigured client as unavailable', async () => {
            expect(await new GenerationClient(null).checkHealth()).toEqual({
                available: false,
                reason: 'Client not initialized',
            })
        })

        it('reports a working backend as available', async () => {
            const { backend } = fakeBackend(async () => 'Hi there!')
            expect(await new GenerationClient(backend).checkHealth()).toEqual({
                available: true,
                reason: 'API working',
            })
        })

        it('uses a single attempt and ignores fallback text', async () => {
            const { backend, generate } = fakeBackend(async () => {
                throw new Error('401 invalid key')
            })

            const status = await new GenerationClient(backend).checkHealth()

            expect(status).toEqual({ available: false, reason: 'API not responding properly' })
            expect(generate).toHaveBeenCalledTimes(1)
        })
    })
})
