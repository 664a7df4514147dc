import { FetchError } from './Errors';
import { logger } from './Logger';

const USER_AGENT = 'embedpy-cli/0.1.0';

export interface DownloadOptions {
  /** Milliseconds; 0 or absent waits indefinitely */
  timeout?: number;
  signal?: AbortSignal;
}

export class HttpClient {
  /**
   * Single GET, whole body buffered. Any non-2xx status or transport failure is a FetchError.
   */
  static async download(url: string, options: DownloadOptions = {}): Promise<Buffer> {
    const signal = this.buildSignal(options);
    logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': USER_AGENT,
        },
        redirect: 'follow',
        ...(signal && { signal }),
      });
    } catch (error) {
      throw new FetchError(url, this.describeFailure(error, options), undefined, error);
    }

    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`.trim(), response.status);
    }

    try {
      const body = Buffer.from(await response.arrayBuffer());
      logger.debug(`Downloaded ${body.length} bytes from ${url}`);
      return body;
    } catch (error) {
      throw new FetchError(url, this.describeFailure(error, options), response.status, error);
    }
  }

  private static buildSignal(options: DownloadOptions): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (options.signal) signals.push(options.signal);
    if (options.timeout && options.timeout > 0) signals.push(AbortSignal.timeout(options.timeout));

    if (signals.length <= 1) {
      return signals[0];
    }

    const controller = new AbortController();
    for (const signal of signals) {
      if (signal.aborted) {
        controller.abort(signal.reason);
        break;
      }
      signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
    }
    return controller.signal;
  }

  private static describeFailure(error: unknown, options: DownloadOptions): string {
    if (error instanceof Error && error.name === 'TimeoutError') {
      return `timed out after ${options.timeout}ms`;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return 'aborted';
    }
    return error instanceof Error ? error.message : 'Unknown error';
  }
}
