import OpenAI from 'openai'
import type { TextGenerator } from '@consultflow/core'

export const DEFAULT_OPENAI_MODEL = 'gpt-4.1-mini'

export interface OpenAITextGeneratorOptions {
  apiKey: string
  model?: string
  temperature?: number
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly client: OpenAI
  private readonly model: string
  private readonly temperature: number

  constructor(options: OpenAITextGeneratorOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey })
    this.model = options.model || DEFAULT_OPENAI_MODEL
    this.temperature = options.temperature ?? 0.7
  }

  async ask(systemInstructions: string, userPrompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      messages: [
        { role: 'system', content: systemInstructions },
        { role: 'user', content: userPrompt },
      ],
    })

    const text = completion.choices?.[0]?.message?.content ?? ''
    if (!text.trim()) {
      throw new Error('Text generation returned an empty answer')
    }
    return text
  }
}
