/**
 * Web capability
 *
 * Action: fetch_url {url, textOnly?}. HTML is reduced to text unless
 * textOnly is false.
 */

import type { CapabilityOutput, CapabilityProvider, InvokeRequest } from '../types/capability';
import { CapabilityError } from '../types/capability';
import { optionalBoolean, requireText, unknownAction } from './args';
import { htmlToText } from './html-text';

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export interface WebProviderOptions {
  /** Defaults to the global fetch */
  fetch?: FetchFunction;
  timeoutMs: number;
}

function parseHttpUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new CapabilityError('VALIDATION', `Invalid URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new CapabilityError('VALIDATION', `URL must use http or https: ${url}`);
  }
  return parsed;
}

export class WebProvider implements CapabilityProvider {
  readonly name = 'web';
  private readonly fetch: FetchFunction;

  constructor(private readonly options: WebProviderOptions) {
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async invoke(request: InvokeRequest): Promise<CapabilityOutput> {
    if (request.action !== 'fetch_url') {
      throw unknownAction(this.name, request.action);
    }

    const url = parseHttpUrl(requireText(request.args, 'url')).toString();
    const textOnly = optionalBoolean(request.args, 'textOnly', true);
    const timeoutMs = Math.min(this.options.timeoutMs, request.timeoutMs);

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();
    request.signal.addEventListener('abort', onAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetch(url, { signal: controller.signal, redirect: 'follow' });
      } catch (error) {
        if (timedOut) {
          throw new CapabilityError('TIMEOUT', `Request to ${url} timed out after ${timeoutMs}ms`);
        }
        if (request.signal.aborted) {
          throw new CapabilityError('TIMEOUT', `Request to ${url} aborted`);
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new CapabilityError('TRANSPORT', `Request to ${url} failed: ${message}`, {
          cause: error,
        });
      }

      if (response.status === 429 || response.status >= 500) {
        throw new CapabilityError('UNAVAILABLE', `HTTP ${response.status} from ${url}`);
      }
      if (!response.ok) {
        throw new CapabilityError('REJECTED', `HTTP ${response.status} from ${url}`);
      }

      const contentType = response.headers.get('content-type') ?? '';
      const body = await response.text();
      const content = textOnly && contentType.includes('html') ? htmlToText(body) : body;
      return { url, status: response.status, contentType, content, length: content.length };
    } finally {
      clearTimeout(timer);
      request.signal.removeEventListener('abort', onAbort);
    }
  }
}
