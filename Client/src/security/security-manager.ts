/**
 * SecurityManager - screens tool registrations and server interactions
 * through a content screener (Lakera Guard by default).
 *
 * Two independent knobs decide what happens:
 *  - failOnViolation: flagged content throws SecurityViolation (true) or is
 *    only logged and reported as unsafe (false).
 *  - failMode: what a screening *failure* means. 'open' lets the content
 *    through, 'closed' blocks it.
 */

import { logger, Logger } from '@guarded-mcp/shared/Utils/logger.js';
import { errorMessage } from '@guarded-mcp/shared/Types/errors.js';
import { SecurityViolation } from '../utils/errors.js';
import { isJsonObject, stringifyForScreening } from '../utils/helpers.js';
import type { JsonObject } from '../mcp-clients/types.js';
import { LakeraClient } from './guard-client.js';
import {
  emptyScreeningStats,
  type ContentScreener,
  type FailMode,
  type GuardResult,
  type ScreeningStats,
} from './types.js';

export interface SecurityManagerOptions {
  /** Defaults to a LakeraClient configured from the environment */
  guardClient?: ContentScreener;
  enableToolScreening?: boolean;
  enableInteractionScreening?: boolean;
  /** Screen server responses after each call */
  screenResponses?: boolean;
  failOnViolation?: boolean;
  failMode?: FailMode;
}

function hasEntries(value: unknown): value is Record<string, unknown> {
  return isJsonObject(value) && Object.keys(value).length > 0;
}

export class SecurityManager {
  readonly guardClient: ContentScreener;
  readonly enableToolScreening: boolean;
  readonly enableInteractionScreening: boolean;
  readonly screenResponses: boolean;
  readonly failOnViolation: boolean;
  readonly failMode: FailMode;
  private stats: ScreeningStats = emptyScreeningStats();
  private logger: Logger;

  constructor(options: SecurityManagerOptions = {}) {
    this.guardClient = options.guardClient ?? new LakeraClient();
    this.enableToolScreening = options.enableToolScreening ?? true;
    this.enableInteractionScreening = options.enableInteractionScreening ?? true;
    this.screenResponses = options.screenResponses ?? true;
    this.failOnViolation = options.failOnViolation ?? true;
    this.failMode = options.failMode ?? 'open';
    this.logger = logger.child('security');
  }

  /**
   * Screen a tool as it is discovered.
   * Returns false when the tool should be hidden.
   */
  async screenToolRegistration(
    toolName: string,
    toolDescription: string,
    toolParameters?: Record<string, unknown>
  ): Promise<boolean> {
    if (!this.enableToolScreening) {
      return true;
    }

    let toolContent = `Tool: ${toolName}\nDescription: ${toolDescription}`;
    if (hasEntries(toolParameters)) {
      toolContent += `\nParameters: ${stringifyForScreening(toolParameters)}`;
    }

    let result: GuardResult;
    try {
      result = await this.guardClient.screenToolDescription(toolContent);
    } catch (error) {
      this.stats.screeningErrors++;
      this.logger.error(`Error screening tool '${toolName}'`, { error, failMode: this.failMode });
      // Fail-closed hides the tool; fail-open lists it unscreened
      return this.failMode === 'open';
    }

    this.stats.toolsScreened++;

    if (result.flagged) {
      this.stats.violationsDetected++;
      const violationMsg = `Tool '${toolName}' flagged by security screening`;

      if (this.failOnViolation) {
        throw new SecurityViolation(violationMsg, result.categories, result.categoryScores);
      }
      this.logger.warn(violationMsg, { categories: result.categories });
      return false;
    }

    return true;
  }

  /**
   * Screen an outgoing request and, when given, the server's response.
   * Returns false when log-only mode let a flagged exchange through.
   */
  async screenServerInteraction(
    method: string,
    params?: Record<string, unknown>,
    responseData?: Record<string, unknown>
  ): Promise<boolean> {
    if (!this.enableInteractionScreening) {
      return true;
    }

    let requestResult: GuardResult;
    let responseResult: GuardResult | undefined;
    try {
      requestResult = await this.guardClient.screenServerInteraction(method, params);
      if (hasEntries(responseData)) {
        responseResult = await this.guardClient.screenContent(
          `Response for ${method}: ${stringifyForScreening(responseData)}`
        );
      }
    } catch (error) {
      return this.handleScreeningFailure('Error screening server interaction', error);
    }

    this.stats.interactionsScreened++;
    return this.evaluateInteraction(requestResult, responseResult);
  }

  /**
   * Screen only the server's response to `method`.
   */
  async screenResponse(method: string, responseData: Record<string, unknown>): Promise<boolean> {
    if (!this.enableInteractionScreening || !this.screenResponses || !hasEntries(responseData)) {
      return true;
    }

    let responseResult: GuardResult;
    try {
      responseResult = await this.guardClient.screenContent(
        `Response for ${method}: ${stringifyForScreening(responseData)}`
      );
    } catch (error) {
      return this.handleScreeningFailure('Error screening server response', error);
    }

    this.stats.interactionsScreened++;
    return this.evaluateInteraction(undefined, responseResult);
  }

  /**
   * Screen a `tools/list` result and keep the tools that pass, in order.
   */
  async screenToolsList<T extends JsonObject>(tools: T[]): Promise<T[]> {
    if (!this.enableToolScreening) {
      return tools;
    }

    const safeTools: T[] = [];

    for (const tool of tools) {
      const toolName = typeof tool.name === 'string' ? tool.name : 'Unknown';
      const toolDescription = typeof tool.description === 'string' ? tool.description : '';
      // Servers differ on where they put the argument schema
      const toolParameters = isJsonObject(tool.inputSchema)
        ? tool.inputSchema
        : isJsonObject(tool.parameters) ? tool.parameters : undefined;

      try {
        if (await this.screenToolRegistration(toolName, toolDescription, toolParameters)) {
          safeTools.push(tool);
        } else {
          this.logger.info(`Tool '${toolName}' filtered out due to security concerns`);
        }
      } catch (error) {
        if (!(error instanceof SecurityViolation)) throw error;
        this.logger.info(`Tool '${toolName}' filtered out due to security violation`);
      }
    }

    return safeTools;
  }

  getScreeningStats(): ScreeningStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyScreeningStats();
  }

  async close(): Promise<void> {
    await this.guardClient.close();
  }

  private evaluateInteraction(requestResult?: GuardResult, responseResult?: GuardResult): boolean {
    const requestFlagged = requestResult?.flagged ?? false;
    const responseFlagged = responseResult?.flagged ?? false;

    if (!requestFlagged && !responseFlagged) {
      return true;
    }

    this.stats.violationsDetected++;
    let violationMsg = 'Server interaction flagged by security screening';
    if (requestResult && requestFlagged) {
      violationMsg += ` (request: ${JSON.stringify(requestResult.categories)})`;
    }
    if (responseResult && responseFlagged) {
      violationMsg += ` (response: ${JSON.stringify(responseResult.categories)})`;
    }

    if (this.failOnViolation) {
      const flagged = requestResult && requestFlagged ? requestResult : responseResult;
      throw new SecurityViolation(violationMsg, flagged?.categories, flagged?.categoryScores);
    }

    this.logger.warn(violationMsg);
    return false;
  }

  private handleScreeningFailure(context: string, error: unknown): boolean {
    this.stats.screeningErrors++;
    this.logger.error(context, { error, failMode: this.failMode });

    if (this.failMode === 'closed') {
      throw new SecurityViolation(`${context} - blocking in fail-closed mode: ${errorMessage(error)}`);
    }
    return true;
  }
}
