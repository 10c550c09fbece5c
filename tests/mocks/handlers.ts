/**
 * MSW Request Handlers
 *
 * Mock handlers for external API calls (OpenRouter chat completions)
 */

import { http, HttpResponse } from 'msw';
import { z } from 'zod';

import { detectAgent, AGENT_REPLIES } from './agent-replies';

export const OPENROUTER_CHAT_URL = 'https://openrouter.ai/api/v1/chat/completions';

const ChatCompletionRequestSchema = z.object({
  model: z.string(),
  messages: z.array(z.object({ role: z.string(), content: z.unknown() })),
});

type ChatCompletionRequestBody = z.infer<typeof ChatCompletionRequestSchema>;

function getSystemText(body: ChatCompletionRequestBody): string | undefined {
  const content = body.messages.find((m) => m.role === 'system')?.content;
  return typeof content === 'string' ? content : undefined;
}

export function buildChatCompletion(model: string, content: string) {
  return {
    id: 'mock-completion-id',
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop',
      },
    ],
    usage: { prompt_tokens: 100, completion_tokens: 200, total_tokens: 300 },
  };
}

export const handlers = [
  /**
   * Mock OpenRouter API (chat completions)
   * Answers agent prompts with their canned reply, anything else with plain text.
   */
  http.post(OPENROUTER_CHAT_URL, async ({ request }) => {
    const body = ChatCompletionRequestSchema.parse(await request.json());
    const agent = detectAgent(getSystemText(body));
    const content = agent ? AGENT_REPLIES[agent] : '  Mocked completion text.  ';
    return HttpResponse.json(buildChatCompletion(body.model, content));
  }),
];

/**
 * Handlers that simulate OpenRouter errors
 */
export const errorHandlers = {
  rateLimited: http.post(OPENROUTER_CHAT_URL, () => {
    return HttpResponse.json({ error: { message: 'Rate limit exceeded', code: 429 } }, { status: 429 });
  }),
  unauthorized: http.post(OPENROUTER_CHAT_URL, () => {
    return HttpResponse.json({ error: { message: 'Invalid API key', code: 401 } }, { status: 401 });
  }),
};
