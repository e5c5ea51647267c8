/**
 * Screening API wire types and the result shape shared by the guard client,
 * the security manager and tests.
 */
import { z } from 'zod';

export interface GuardMessage {
  role: string;
  content: string;
}

export interface GuardRequest {
  messages: GuardMessage[];
  dev_info: boolean;
}

/**
 * Schema of the screening endpoint's response body.
 */
export const GuardResponseSchema = z.object({
  flagged: z.boolean(),
  categories: z.record(z.boolean()).nullish(),
  category_scores: z.record(z.number()).nullish(),
  dev_info: z.record(z.unknown()).nullish(),
});

export interface GuardResult {
  flagged: boolean;
  categories: Record<string, boolean>;
  categoryScores: Record<string, number>;
  devInfo?: Record<string, unknown>;
}

/**
 * Parse a screening response body into a GuardResult; null when it does not match.
 */
export function parseGuardResponse(body: unknown): GuardResult | null {
  const parsed = GuardResponseSchema.safeParse(body);
  if (!parsed.success) {
    return null;
  }

  const data = parsed.data;
  const result: GuardResult = {
    flagged: data.flagged,
    categories: data.categories ?? {},
    categoryScores: data.category_scores ?? {},
  };
  if (data.dev_info) {
    result.devInfo = data.dev_info;
  }
  return result;
}

/**
 * Anything that can screen text. LakeraClient is the production implementation.
 */
export interface ContentScreener {
  screenContent(content: string | GuardMessage[], includeDevInfo?: boolean): Promise<GuardResult>;
  screenToolDescription(description: string): Promise<GuardResult>;
  screenServerInteraction(method: string, params?: Record<string, unknown>): Promise<GuardResult>;
  close(): Promise<void>;
}

/**
 * What a screening failure (not a flag) means:
 *  'open'   = treat as safe (availability over security)
 *  'closed' = block
 */
export type FailMode = 'open' | 'closed';

export interface ScreeningStats {
  toolsScreened: number;
  interactionsScreened: number;
  violationsDetected: number;
  screeningErrors: number;
}

export function emptyScreeningStats(): ScreeningStats {
  return {
    toolsScreened: 0,
    interactionsScreened: 0,
    violationsDetected: 0,
    screeningErrors: 0,
  };
}
