import type { NotificationChannel } from './channel.js'
import { sanitizeObject } from '../core/sanitize.js'
import type { Task } from '../core/types.js'

const PENDING_COLOR = 0xffa500
const MAX_FIELD_LENGTH = 1000

export interface DiscordChannelConfig {
  webhookUrl: string
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text
}

export class DiscordChannel implements NotificationChannel {
  private readonly webhookUrl: string

  constructor(config: DiscordChannelConfig) {
    this.webhookUrl = config.webhookUrl
  }

  async notifyPendingApproval(task: Task): Promise<void> {
    const payload = truncate(
      JSON.stringify(sanitizeObject(task.payload), null, 2),
      MAX_FIELD_LENGTH,
    )
    const embed = {
      title: 'Approval Needed',
      color: PENDING_COLOR,
      fields: [
        { name: 'Task', value: task.id, inline: true },
        { name: 'Source', value: task.source, inline: true },
        { name: 'Type', value: task.type, inline: true },
        { name: 'Payload', value: '```json\n' + payload + '\n```' },
        {
          name: 'Decide',
          value: `vclerk tasks approve ${task.id} --actor <name>`,
        },
      ],
    }

    await this.post({ embeds: [embed] })
  }

  async sendNotification(message: string): Promise<void> {
    await this.post({ content: message })
  }

  private async post(body: unknown): Promise<void> {
    const response = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })

    if (!response.ok) {
      throw new Error(`Discord webhook failed: ${response.status} ${response.statusText}`)
    }
  }
}
