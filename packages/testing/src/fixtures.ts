import { type Amenity, type IdentityToken, type LLMResponse, type ToolCall } from '@concierge/core';

export const TEST_IDENTITY: IdentityToken = { provider: 'google', token: 'test-token' };

export function createFakeLLMResponse(overrides: Partial<LLMResponse> = {}): LLMResponse {
  return {
    content: 'Fake response',
    toolCalls: [],
    tokensUsed: { promptTokens: 0, completionTokens: 0 },
    model: 'fake-model',
    latencyMs: 10,
    ...overrides
  };
}

export function createToolCallResponse(toolCalls: ToolCall[]): LLMResponse {
  return createFakeLLMResponse({ content: null, toolCalls });
}

export function createTestAmenity(overrides: Partial<Amenity> & Pick<Amenity, 'id'>): Amenity {
  return {
    name: `Amenity ${overrides.id}`,
    description: 'A place in the terminal',
    location: 'Near gate A1',
    terminal: 'T1',
    category: 'Services',
    hour: '06:00 - 22:00',
    content: 'A place in the terminal',
    ...overrides
  };
}

/** Small hand-made catalogue with two-dimensional embeddings. */
export function createTestAmenities(): Amenity[] {
  return [
    createTestAmenity({
      id: 1,
      name: 'Bean Counter Coffee',
      category: 'Food & Drink',
      description: 'Espresso bar with pastries',
      content: 'Espresso bar with pastries',
      embedding: [1, 0]
    }),
    createTestAmenity({
      id: 2,
      name: 'Gate Side Bakery',
      category: 'Food & Drink',
      description: 'Fresh bread and coffee',
      content: 'Fresh bread and coffee',
      embedding: [0.8, 0.6]
    }),
    createTestAmenity({
      id: 3,
      name: 'Skyline Lounge',
      category: 'Lounge',
      terminal: 'T2',
      description: 'Quiet lounge with showers',
      content: 'Quiet lounge with showers',
      embedding: [0, 1]
    })
  ];
}
