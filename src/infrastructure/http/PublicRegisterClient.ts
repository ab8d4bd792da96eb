/**
 * Public Register Client — The Only Code That Talks to the Upstream API
 * Layer: Infrastructure
 * Pattern: Adapter Pattern (implements IRegistryClient)
 *
 * The register exposes one POST endpoint and dispatches on the `slug` and
 * `method` fields inside the JSON body, so listing and detail lookups are
 * both POSTs that differ only in their payload:
 *
 *   listing  { name, licenseType, licenseNo, status, offset,
 *              slug: '/CRM/public-register', method: 'POST' }
 *   detail   { slug: '/CRM/public-register?recordId=<id>', method: 'GET' }
 *
 * Every outcome is returned as a neverthrow Result:
 *   - axios error with a response     → { kind: 'http', status }
 *   - axios error without a response  → { kind: 'transport' } (refused, reset, timeout)
 *   - body that is not JSON, or a listing whose companyList is not a list
 *     of objects                      → { kind: 'malformed' }
 *
 * A listing envelope without `Data.companyList` reads as an empty page; the
 * lister treats that as the end of the listing.
 */
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { SummaryRecord } from '@domain/entities/CompanySummary';
import type { IRegistryClient, RegistryFailure } from '@domain/interfaces/IRegistryClient';
import { REGISTRY_SLUG } from '@shared/constants';
import type { ScraperOptions } from '@shared/types';
import axios, { type AxiosInstance } from 'axios';
import { err, ok, type Result } from 'neverthrow';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';

const listingEnvelopeSchema = z.object({
  Data: z
    .object({
      companyList: z.array(z.record(z.string(), z.unknown())).optional(),
    })
    .optional(),
});

@injectable()
export class PublicRegisterClient implements IRegistryClient {
  constructor(
    @inject(TOKENS.HttpClient) private http: AxiosInstance,
    @inject(TOKENS.ScraperOptions) private options: ScraperOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async listCompanies(offset: number): Promise<Result<SummaryRecord[], RegistryFailure>> {
    const body = await this.send({
      name: '',
      licenseType: '',
      licenseNo: '',
      status: '',
      offset,
      slug: REGISTRY_SLUG,
      method: 'POST',
    });

    return body.andThen((json) => {
      const parsed = listingEnvelopeSchema.safeParse(json);
      if (!parsed.success) {
        return err<SummaryRecord[], RegistryFailure>({
          kind: 'malformed',
          message: `listing at offset ${offset} does not match the expected envelope`,
        });
      }
      return ok(parsed.data.Data?.companyList ?? []);
    });
  }

  async fetchCompanyDetail(recordId: string): Promise<Result<unknown, RegistryFailure>> {
    return this.send({
      slug: `${REGISTRY_SLUG}?recordId=${encodeURIComponent(recordId)}`,
      method: 'GET',
    });
  }

  private async send(payload: Record<string, unknown>): Promise<Result<unknown, RegistryFailure>> {
    let raw: unknown;
    try {
      const response = await this.http.post<string>(this.options.apiUrl, JSON.stringify(payload));
      raw = response.data;
    } catch (error) {
      const failure = toFailure(error);
      this.log.debug({ slug: payload.slug, failure }, 'Register request failed');
      return err(failure);
    }

    if (typeof raw !== 'string') return ok(raw);

    try {
      const json: unknown = JSON.parse(raw);
      return ok(json);
    } catch {
      this.log.debug({ slug: payload.slug, bytes: raw.length }, 'Register response is not JSON');
      const failure: RegistryFailure = { kind: 'malformed', message: 'response body is not valid JSON' };
      return err(failure);
    }
  }
}

function toFailure(error: unknown): RegistryFailure {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return { kind: 'http', status: error.response.status, message: error.message };
    }
    return { kind: 'transport', message: error.message };
  }
  return { kind: 'transport', message: error instanceof Error ? error.message : String(error) };
}
