import type { ChatNotifier, ChatPost } from './types'

/**
 * Slack incoming webhook. The webhook is bound to a channel on the Slack
 * side; `channel` is passed along for webhooks that allow overriding it.
 */
export class SlackWebhookNotifier implements ChatNotifier {
  readonly name = 'slack-webhook'

  constructor(private readonly webhookUrl: string) {}

  async post(message: ChatPost): Promise<boolean> {
    try {
      const res = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ channel: message.channel, text: message.text }),
      })
      if (!res.ok) {
        console.warn(`[adapters] Slack webhook responded with HTTP ${res.status}`)
      }
      return res.ok
    } catch (err) {
      console.warn('[adapters] Slack webhook request failed:', err instanceof Error ? err.message : String(err))
      return false
    }
  }
}
