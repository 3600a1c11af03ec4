import { ClaudeTransformer, NO_MAPPING, stripCodeFence } from '../src/runtime/claude-transformer';

// Mock the Anthropic SDK
const mockCreate = jest.fn();
jest.mock('@anthropic-ai/sdk', () => {
  return {
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({
      messages: {
        create: (...args: unknown[]) => mockCreate(...args),
      },
    })),
  };
});

/**
 * Helper to create a mock Claude API response.
 */
function mockResponse(text: string, stopReason = 'end_turn') {
  return {
    content: [{ type: 'text', text }],
    stop_reason: stopReason,
    usage: { input_tokens: 100, output_tokens: 200 },
  };
}

describe('ClaudeTransformer', () => {
  const originalWarn = console.warn;
  beforeAll(() => { console.warn = jest.fn(); });
  afterAll(() => { console.warn = originalWarn; });

  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('should send the program and both languages to the model', async () => {
    mockCreate.mockResolvedValue(mockResponse('fn main() {}'));
    const transformer = new ClaudeTransformer({ apiKey: 'test-key', model: 'test-model', maxTokens: 512 });

    await transformer.translate('php', 'rust', 'echo 1;');

    expect(mockCreate).toHaveBeenCalledTimes(1);
    const request = mockCreate.mock.calls[0][0];
    expect(request.model).toBe('test-model');
    expect(request.max_tokens).toBe(512);
    expect(request.system).toContain(NO_MAPPING);
    expect(request.messages).toEqual([{ role: 'user', content: 'Translate this php program to rust:\n\necho 1;' }]);
  });

  it('should default to the sonnet model', async () => {
    mockCreate.mockResolvedValue(mockResponse('x'));
    await new ClaudeTransformer({ apiKey: 'test-key' }).translate('python', 'go', 'print(1)');
    expect(mockCreate.mock.calls[0][0].model).toBe('claude-sonnet-4-5-20250929');
  });

  it('should strip code fences and end with a newline', async () => {
    mockCreate.mockResolvedValue(mockResponse('```rust\nfn main() {\n    println!("1");\n}\n```'));
    const result = await new ClaudeTransformer({ apiKey: 'test-key' }).translate('php', 'rust', 'echo 1;');
    expect(result).toBe('fn main() {\n    println!("1");\n}\n');
  });

  it('should return null when the model declines', async () => {
    mockCreate.mockResolvedValue(mockResponse(NO_MAPPING));
    await expect(new ClaudeTransformer({ apiKey: 'test-key' }).translate('php', 'rust', 'x')).resolves.toBeNull();
  });

  it('should return null for an empty reply', async () => {
    mockCreate.mockResolvedValue({ content: [], stop_reason: 'end_turn' });
    await expect(new ClaudeTransformer({ apiKey: 'test-key' }).translate('php', 'rust', 'x')).resolves.toBeNull();
  });

  it('should return null and warn on truncation', async () => {
    mockCreate.mockResolvedValue(mockResponse('fn main() {', 'max_tokens'));
    await expect(new ClaudeTransformer({ apiKey: 'test-key' }).translate('php', 'rust', 'x')).resolves.toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should propagate API errors', async () => {
    mockCreate.mockRejectedValue(new Error('rate limited'));
    await expect(new ClaudeTransformer({ apiKey: 'test-key' }).translate('php', 'rust', 'x')).rejects.toThrow('rate limited');
  });
});

describe('stripCodeFence()', () => {
  it('should leave unfenced text alone apart from trimming', () => {
    expect(stripCodeFence('  print(1)\n')).toBe('print(1)');
  });

  it('should remove a fence without a language tag', () => {
    expect(stripCodeFence('```\nx = 1\n```')).toBe('x = 1');
  });
});
