/**
 * Notifications for pool and alert changes.
 *
 * Always logged; also posted to WEBHOOK_URL when set. The payload carries
 * both `content` (Discord) and `text` (Slack) so either webhook accepts it.
 */

import type { Config } from '../config.js';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

const WEBHOOK_TIMEOUT_MS = 5_000;

export function webhookPayload(message: string): { content: string; text: string } {
  const line = `**Role Orchestrator**: ${message}`;
  return { content: line, text: line };
}

/** Never rejects; a failed delivery is logged. */
export async function notify(config: Config, message: string): Promise<void> {
  log(`[NOTIFY] ${message}`);

  if (!config.webhookUrl) return;

  try {
    const res = await fetch(config.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(webhookPayload(message)),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
    });
    if (!res.ok) log(`[NOTIFY] Webhook returned HTTP ${res.status}`);
  } catch (err) {
    log(`[NOTIFY] Failed to send webhook: ${errorMessage(err)}`);
  }
}
