import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import {runAgentTask} from '../src/core/agent.js'
import {StartupError} from '../src/core/errors.js'
import {makeWorkspace, removeWorkspace} from './helpers.js'

type ChatBody = {
  model?: string
  messages: Array<{
    role: string
    content: string | null
    tool_call_id?: string
    tool_calls?: Array<{id: string; type: string; function: {name: string; arguments: string}}>
  }>
}

function completion(message: Record<string, unknown>): Response {
  return new Response(JSON.stringify({choices: [{index: 0, message: {role: 'assistant', ...message}}]}), {
    status: 200,
    headers: {'Content-Type': 'application/json'}
  })
}

describe('agent smoke test', () => {
  let home: string

  beforeEach(async () => {
    home = await makeWorkspace()
    process.env.TOOLLOOP_HOME = home
  })

  afterEach(async () => {
    vi.unstubAllGlobals()
    delete process.env.OPENROUTER_API_KEY
    delete process.env.OPENROUTER_BASE_URL
    delete process.env.TOOLLOOP_MODEL
    delete process.env.TOOLLOOP_HOME
    await removeWorkspace(home)
  })

  it('uses the base url and model from env', async () => {
    process.env.OPENROUTER_API_KEY = 'test-key'
    process.env.TOOLLOOP_MODEL = 'test/model'
    process.env.OPENROUTER_BASE_URL = 'https://example-llm.test/v1/'
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
      expect(url).toBe('https://example-llm.test/v1/chat/completions')
      const body = JSON.parse(String(init?.body)) as ChatBody
      expect(body.model).toBe('test/model')
      return completion({content: 'hello from the model'})
    })
    vi.stubGlobal('fetch', fetchMock)

    const output = await runAgentTask('hello')
    expect(output).toBe('hello from the model')
    expect(fetchMock).toHaveBeenCalledOnce()
  })

  it('runs a Bash tool call and replays the call with its result', async () => {
    process.env.OPENROUTER_API_KEY = 'test-key'
    process.env.OPENROUTER_BASE_URL = 'https://example-llm.test/v1'
    const bodies: ChatBody[] = []
    const fetchMock = vi
      .fn(async (_input: string | URL | Request, init?: RequestInit) => {
        bodies.push(JSON.parse(String(init?.body)) as ChatBody)
        return completion({content: 'The command printed hi.'})
      })
      .mockImplementationOnce(async (_input: string | URL | Request, init?: RequestInit) => {
        bodies.push(JSON.parse(String(init?.body)) as ChatBody)
        return completion({
          content: null,
          tool_calls: [{id: 'call_1', type: 'function', function: {name: 'Bash', arguments: '{"command":"echo hi"}'}}]
        })
      })
    vi.stubGlobal('fetch', fetchMock)

    expect(await runAgentTask('say hi')).toBe('The command printed hi.')
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(bodies[1]?.messages).toEqual([
      {role: 'user', content: 'say hi'},
      {
        role: 'assistant',
        content: null,
        tool_calls: [{id: 'call_1', type: 'function', function: {name: 'Bash', arguments: '{"command":"echo hi"}'}}]
      },
      {role: 'tool', content: 'hi\n', tool_call_id: 'call_1'}
    ])
  })

  it('fails before any request when the api key is missing', async () => {
    const fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)

    await expect(runAgentTask('hello')).rejects.toBeInstanceOf(StartupError)
    expect(fetchMock).not.toHaveBeenCalled()
  })
})
