import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

vi.mock('../../lib/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

const request = { system: 'be brief', prompt: 'summarize PAY-101', maxTokens: 500 };

describe('AnthropicProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should post to the messages endpoint and join text blocks', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        content: [
          { type: 'text', text: '## Task: PAY-101' },
          { type: 'text', text: '\nDone.' },
        ],
        stop_reason: 'end_turn',
      })
    );
    const { AnthropicProvider } = await import('./anthropic.js');
    const provider = new AnthropicProvider({ apiKey: 'test-secret', model: 'test-model' });

    const text = await provider.complete(request);

    expect(text).toBe('## Task: PAY-101\nDone.');
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(init.headers).toMatchObject({ 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' });
    expect(JSON.parse(init.body)).toEqual({
      model: 'test-model',
      max_tokens: 500,
      system: 'be brief',
      messages: [{ role: 'user', content: 'summarize PAY-101' }],
    });
    provider.close();
  });

  it('should fail on a non-2xx status', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: {} }, 529));
    const { AnthropicProvider } = await import('./anthropic.js');
    const provider = new AnthropicProvider({ apiKey: 'test-secret', model: 'test-model' });

    await expect(provider.complete(request)).rejects.toThrow('Anthropic returned 529');
    provider.close();
  });

  it('should fail without an API key and skip the request', async () => {
    const { AnthropicProvider } = await import('./anthropic.js');
    const provider = new AnthropicProvider({ apiKey: '', model: 'test-model' });

    await expect(provider.complete(request)).rejects.toThrow('ANTHROPIC_API_KEY is not set');
    expect(mockFetch).not.toHaveBeenCalled();
    provider.close();
  });
});

describe('OllamaProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should call /api/generate without streaming', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ response: ' context body \n' }));
    const { OllamaProvider } = await import('./ollama.js');
    const provider = new OllamaProvider({ url: 'http://ollama.test:11434/', model: 'llama3.2:3b' });

    const text = await provider.complete(request);

    expect(text).toBe('context body');
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://ollama.test:11434/api/generate');
    expect(JSON.parse(init.body)).toEqual({
      model: 'llama3.2:3b',
      system: 'be brief',
      prompt: 'summarize PAY-101',
      stream: false,
      options: { num_predict: 500 },
    });
    provider.close();
  });

  it('should fail on an empty response', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ response: '   ' }));
    const { OllamaProvider } = await import('./ollama.js');
    const provider = new OllamaProvider({ url: 'http://ollama.test:11434', model: 'llama3.2:3b' });

    await expect(provider.complete(request)).rejects.toThrow('Ollama returned no text');
    provider.close();
  });
});

describe('OpenAIProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should send system and user messages to chat completions', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: '## Task: PAY-101\n' } }] }));
    const { OpenAIProvider } = await import('./openai.js');
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'test-model', url: 'https://openai.test/v1/' });

    const text = await provider.complete(request);

    expect(text).toBe('## Task: PAY-101');
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://openai.test/v1/chat/completions');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(init.body)).toEqual({
      model: 'test-model',
      max_tokens: 500,
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'summarize PAY-101' },
      ],
    });
    provider.close();
  });

  it('should fail when the first choice has no content', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: null } }] }));
    const { OpenAIProvider } = await import('./openai.js');
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'test-model', url: 'https://openai.test/v1' });

    await expect(provider.complete(request)).rejects.toThrow('OpenAI returned no text');
    provider.close();
  });

  it('should fail without an API key and skip the request', async () => {
    const { OpenAIProvider } = await import('./openai.js');
    const provider = new OpenAIProvider({ apiKey: '', model: 'test-model', url: 'https://openai.test/v1' });

    await expect(provider.complete(request)).rejects.toThrow('OPENAI_API_KEY is not set');
    expect(mockFetch).not.toHaveBeenCalled();
    provider.close();
  });
});
