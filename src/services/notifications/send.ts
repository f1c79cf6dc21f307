/**
 * Webhook send path.
 * Posts a JSON payload to one webhook URL and reports whether the endpoint
 * acknowledged it. Never throws: transport errors come back as a failure.
 */
import { DeliveryError, redactWebhookUrl, toError } from '../../lib/errors';
import { Logger, logger as defaultLogger } from '../../lib/logger';

export interface SendOutcome {
  success: boolean;
  statusCode?: number;
  detail: string;
  error?: DeliveryError;
}

/**
 * Anything that can deliver a rendered message to one destination
 */
export interface DestinationSender {
  send(endpoint: string, message: unknown): Promise<SendOutcome>;
}

export interface WebhookSenderOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
}

export class WebhookSender implements DestinationSender {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: WebhookSenderOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'WebhookSender' });
  }

  async send(endpoint: string, message: unknown): Promise<SendOutcome> {
    const destination = redactWebhookUrl(endpoint);
    this.logger.debug('Webhook send (start)', { destination });

    try {
      const response = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(message),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.ok) {
        return { success: true, statusCode: response.status, detail: `HTTP ${response.status}` };
      }

      const body = await readBody(response);
      const error = new DeliveryError(
        endpoint,
        `Webhook responded with HTTP ${response.status}${body ? `: ${body}` : ''}`,
        response.status
      );
      this.logger.warn('Webhook rejected message', { destination, statusCode: response.status, body });
      return { success: false, statusCode: response.status, detail: error.message, error };
    } catch (err) {
      const cause = toError(err);
      const error = new DeliveryError(endpoint, `Webhook request failed: ${cause.message}`);
      this.logger.error('Webhook request failed', cause, { destination });
      return { success: false, detail: error.message, error };
    }
  }
}

async function readBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.slice(0, 200);
  } catch {
    return '';
  }
}
