/**
 * Context Specification Provider - Fetches the topology/policy blob for a run
 * The blob is opaque text: it is injected verbatim into prompts and never parsed
 */

import type { ContextProviderConfig } from '../schemas/config.schema.js';
import { ServiceUnavailableError, describeError } from './service-errors.js';

export interface ContextSpecificationProvider {
  fetchSpecification(): Promise<string>;
}

/**
 * Provider that issues one HTTP GET per call
 */
export class HttpContextProvider implements ContextSpecificationProvider {
  constructor(private readonly config: ContextProviderConfig) {}

  /**
   * Fetch the context specification
   *
   * @throws ServiceUnavailableError on network failure, timeout or non-2xx status
   */
  async fetchSpecification(): Promise<string> {
    let response: Response;
    try {
      response = await fetch(this.config.url, {
        method: 'GET',
        headers: { Accept: 'application/json, text/plain' },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new ServiceUnavailableError(
        `Context provider ${this.config.url} is unreachable: ${describeError(error)}`,
        'context-provider',
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new ServiceUnavailableError(
        `Context provider ${this.config.url} answered ${response.status} ${response.statusText}`,
        'context-provider'
      );
    }

    return response.text();
  }
}
