/**
 * LLM clients. One interface, one implementation per wire protocol.
 */
import { GoogleGenAI } from '@google/genai'
import { z } from 'zod'
import type { ChatTurn } from '@/types/scan'
import type { LlmConfig } from '@/lib/config'
import { LlmError, errorMessage } from '@/lib/errors'
import { HttpRequestError, requestJson } from '@/lib/http'

const LLM_TIMEOUT_MS = 60000

export type GenerateRequest = {
  systemPrompt: string
  userMessage: string
  history?: ChatTurn[]
}

export type GenerateResponse = {
  text: string
  tokensUsed: number
  model: string
}

export interface LlmClient {
  readonly model: string
  generate: (request: GenerateRequest) => Promise<GenerateResponse>
}

function toLlmError(provider: string, error: unknown): LlmError {
  if (error instanceof LlmError) return error
  const status =
    error instanceof HttpRequestError && error.failure.kind === 'status' ? error.failure.status : undefined
  return new LlmError(`${provider} request failed: ${errorMessage(error)}`, status, { cause: error })
}

const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: z.object({ total_tokens: z.number() }).nullish(),
})

/**
 * OpenAI chat completions protocol, also spoken by Groq and OpenRouter.
 */
export class OpenAiCompatibleClient implements LlmClient {
  readonly model: string

  constructor(private config: LlmConfig) {
    this.model = config.model
  }

  async generate({ systemPrompt, userMessage, history = [] }: GenerateRequest): Promise<GenerateResponse> {
    const messages = [
      { role: 'system', content: systemPrompt },
      ...history,
      { role: 'user', content: userMessage },
    ]

    try {
      const payload = await requestJson(
        `${this.config.baseUrl.replace(/\/$/, '')}/chat/completions`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          body: JSON.stringify({
            model: this.model,
            messages,
            max_tokens: this.config.maxTokens,
            temperature: this.config.temperature,
          }),
        },
        LLM_TIMEOUT_MS
      )
      const completion = chatCompletionSchema.parse(payload)
      return {
        text: completion.choices[0].message.content ?? '',
        tokensUsed: completion.usage?.total_tokens ?? 0,
        model: this.model,
      }
    } catch (error) {
      throw toLlmError(this.config.provider, error)
    }
  }
}

const anthropicMessageSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
})

export class AnthropicClient implements LlmClient {
  readonly model: string

  constructor(private config: LlmConfig) {
    this.model = config.model
  }

  async generate({ systemPrompt, userMessage, history = [] }: GenerateRequest): Promise<GenerateResponse> {
    try {
      const payload = await requestJson(
        `${this.config.baseUrl.replace(/\/$/, '')}/messages`,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': this.config.apiKey,
            'anthropic-version': '2023-06-01',
          },
          body: JSON.stringify({
            model: this.model,
            max_tokens: this.config.maxTokens,
            temperature: this.config.temperature,
            system: systemPrompt,
            messages: [...history, { role: 'user', content: userMessage }],
          }),
        },
        LLM_TIMEOUT_MS
      )
      const message = anthropicMessageSchema.parse(payload)
      const text = message.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('')
      return {
        text,
        tokensUsed: message.usage ? message.usage.input_tokens + message.usage.output_tokens : 0,
        model: this.model,
      }
    } catch (error) {
      throw toLlmError('anthropic', error)
    }
  }
}

export class GeminiClient implements LlmClient {
  readonly model: string
  private ai: GoogleGenAI

  constructor(private config: LlmConfig) {
    this.model = config.model
    this.ai = new GoogleGenAI({ apiKey: config.apiKey })
  }

  async generate({ systemPrompt, userMessage, history = [] }: GenerateRequest): Promise<GenerateResponse> {
    const contents = [
      ...history.map((turn) => ({
        role: turn.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: turn.content }],
      })),
      { role: 'user', parts: [{ text: userMessage }] },
    ]

    try {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents,
        config: {
          systemInstruction: systemPrompt,
          maxOutputTokens: this.config.maxTokens,
          temperature: this.config.temperature,
        },
      })
      const text = response.text
      if (!text) throw new LlmError('No response from model')
      return {
        text,
        tokensUsed: response.usageMetadata?.totalTokenCount ?? 0,
        model: this.model,
      }
    } catch (error) {
      throw toLlmError('gemini', error)
    }
  }
}

/** undefined when the active provider has no API key configured. */
export function createLlmClient(config: LlmConfig): LlmClient | undefined {
  if (!config.apiKey) return undefined
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicClient(config)
    case 'gemini':
      return new GeminiClient(config)
    case 'openai':
    case 'groq':
    case 'openrouter':
      return new OpenAiCompatibleClient(config)
  }
}
