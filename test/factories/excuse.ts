/**
 * Test Factories: Excuse
 *
 * Provides factory functions for excuse requests and model replies.
 */

import type { ExcuseRequest } from '../../apps/api/src/excuse/types';

export function createExcuseRequest(overrides: Partial<ExcuseRequest> = {}): ExcuseRequest {
  return {
    category: 'Traffic',
    tone: 'apologetic',
    seriousness: 3,
    recipient_name: 'Jordan',
    sender_name: 'Alex',
    eta_when: 'I will be there by 10am.',
    ...overrides,
  };
}

/** Chat-completions style body wrapping the given reply text */
export function createChatReply(content: unknown): Record<string, unknown> {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
  };
}
