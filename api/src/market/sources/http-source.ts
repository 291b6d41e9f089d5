import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import * as qs from 'querystring';

export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = status;
  }
}

/**
 * Shared GET plumbing for the REST-backed history sources.
 */
export abstract class HttpHistorySource {
  abstract readonly name: string;
  readonly simulated = false;

  protected readonly logger: Logger;

  protected constructor(
    protected readonly http: HttpService,
    protected readonly baseUrl: string,
    protected readonly apiKey: string,
    protected readonly timeoutMs: number,
    context: string,
  ) {
    this.logger = new Logger(context);
  }

  protected url(path: string, query: qs.ParsedUrlQueryInput): string {
    return `${this.baseUrl}${path}?${qs.stringify(query)}`;
  }

  protected async safeGet<T>(url: string): Promise<T> {
    try {
      const res = await firstValueFrom(
        this.http.get<T>(url, { timeout: this.timeoutMs }),
      );
      return res.data;
    } catch (e) {
      const status = isAxiosError(e) ? e.response?.status : undefined;
      const message = e instanceof Error ? e.message : String(e);
      // never log the key-bearing URL
      this.logger.warn(
        `[HTTP GET failed] ${this.name} status=${status ?? 'n/a'}: ${message}`,
      );
      throw new ProviderError(this.name, message, status);
    }
  }
}
