/**
 * Lakera Guard API client.
 * Screens text for prompt injection, jailbreaks and other unsafe content.
 */

import { getEnvNumber, getEnvString } from '@guarded-mcp/shared/Utils/config.js';
import { logger } from '@guarded-mcp/shared/Utils/logger.js';
import { ConfigurationError, GuardClientError } from '../utils/errors.js';
import { isJsonObject, stringifyForScreening } from '../utils/helpers.js';
import {
  parseGuardResponse,
  type ContentScreener,
  type GuardMessage,
  type GuardRequest,
  type GuardResult,
} from './types.js';

export const DEFAULT_GUARD_BASE_URL = 'https://api.lakera.ai/v2';

/** Regions with a dedicated endpoint, `https://<region>.api.lakera.ai/v2`. */
export const GUARD_REGIONS = ['us-east-1', 'us-west-2', 'eu-west-1', 'ap-southeast-1'] as const;

export interface LakeraClientOptions {
  /** Defaults to LAKERA_GUARD_API_KEY */
  apiKey?: string;
  /** Defaults to LAKERA_GUARD_BASE_URL, then the public endpoint */
  baseUrl?: string;
  /** Takes precedence over baseUrl. Defaults to LAKERA_GUARD_REGION when no baseUrl is given */
  region?: string;
  /** Request timeout in milliseconds. Defaults to LAKERA_GUARD_TIMEOUT_MS, then 30000 */
  timeout?: number;
}

export class LakeraClient implements ContentScreener {
  readonly baseUrl: string;
  readonly timeout: number;
  private readonly apiKey: string;
  private closed = false;
  private logger = logger.child('lakera');

  constructor(options: LakeraClientOptions = {}) {
    const apiKey = options.apiKey || getEnvString('LAKERA_GUARD_API_KEY');
    if (!apiKey) {
      throw new ConfigurationError(
        'Lakera API key is required. Set LAKERA_GUARD_API_KEY environment variable or pass apiKey option.'
      );
    }
    this.apiKey = apiKey;

    // An explicit baseUrl is never overridden by the environment's region
    const region = options.region ?? (options.baseUrl ? undefined : getEnvString('LAKERA_GUARD_REGION'));
    const baseUrl = region
      ? `https://${region}.api.lakera.ai/v2`
      : options.baseUrl ?? getEnvString('LAKERA_GUARD_BASE_URL', DEFAULT_GUARD_BASE_URL);
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? getEnvNumber('LAKERA_GUARD_TIMEOUT_MS', 30000);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Request headers; the key is never logged. */
  protected getHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
    };
  }

  /**
   * Screen content. A plain string is sent as a single user message.
   */
  async screenContent(
    content: string | GuardMessage[],
    includeDevInfo: boolean = false
  ): Promise<GuardResult> {
    if (this.closed) {
      throw new GuardClientError('Lakera client is closed');
    }

    const messages = typeof content === 'string' ? [{ role: 'user', content }] : content;
    const request: GuardRequest = { messages, dev_info: includeDevInfo };

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/guard`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        this.logger.error('Lakera Guard request timed out', { timeout: this.timeout });
        throw new GuardClientError(`Lakera Guard request timed out after ${this.timeout}ms`);
      }
      this.logger.error('Lakera Guard API request failed', { error });
      throw new GuardClientError(
        `Lakera Guard API request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      this.logger.error('Lakera Guard API returned an error', { status: response.status, body });
      throw new GuardClientError(
        `Lakera Guard API error: ${response.status} ${response.statusText}${body ? ` - ${body}` : ''}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new GuardClientError('Lakera Guard API returned invalid JSON', response.status);
    }

    const result = parseGuardResponse(body);
    if (!result) {
      this.logger.warn('Unexpected Lakera Guard response shape', { body });
      throw new GuardClientError('Invalid Lakera Guard response format', response.status);
    }

    this.logger.debug('Content screened', { flagged: result.flagged });
    return result;
  }

  async screenToolDescription(description: string): Promise<GuardResult> {
    return this.screenContent(description);
  }

  /**
   * Screen an outgoing call as "Method: <method>" plus its JSON parameters.
   */
  async screenServerInteraction(method: string, params?: Record<string, unknown>): Promise<GuardResult> {
    let interactionText = `Method: ${method}`;
    if (isJsonObject(params) && Object.keys(params).length > 0) {
      interactionText += `\nParameters: ${stringifyForScreening(params)}`;
    }
    return this.screenContent(interactionText);
  }

  /**
   * True when the content is not flagged. Any failure counts as unsafe.
   */
  async isContentSafe(content: string | GuardMessage[]): Promise<boolean> {
    try {
      const result = await this.screenContent(content);
      return !result.flagged;
    } catch (error) {
      this.logger.warn('Failed to screen content for safety', { error });
      return false;
    }
  }

  /**
   * Per-category flags for the content; empty when screening fails.
   */
  async getThreatCategories(content: string | GuardMessage[]): Promise<Record<string, boolean>> {
    try {
      const result = await this.screenContent(content);
      return result.categories;
    } catch (error) {
      this.logger.warn('Failed to get threat categories', { error });
      return {};
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
