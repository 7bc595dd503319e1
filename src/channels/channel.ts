import type { Task } from '../core/types.js'

export interface NotificationChannel {
  notifyPendingApproval(task: Task): Promise<void>
  sendNotification(message: string): Promise<void>
}
