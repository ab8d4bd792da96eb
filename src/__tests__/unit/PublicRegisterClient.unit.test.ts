/**
 * Unit Tests — PublicRegisterClient
 *
 * The axios instance is the real one built by createRegistryHttpClient with
 * its adapter swapped for an in-process stub, so request payloads, headers
 * and every failure mapping are exercised without a network.
 */
import { createRegistryHttpClient } from '@infrastructure/http/httpClient';
import { PublicRegisterClient } from '@infrastructure/http/PublicRegisterClient';
import { describeFailure } from '@domain/interfaces/IRegistryClient';
import {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

import { silentLogger } from '../helpers/doubles';
import { makeCompany, testOptions } from '../helpers/fixtures';

type Reply = { status: number; body: unknown } | { refused: true };

describe('PublicRegisterClient', () => {
  let http: AxiosInstance;
  let client: PublicRegisterClient;
  let requests: InternalAxiosRequestConfig[];

  function replyWith(...replies: Reply[]): void {
    http.defaults.adapter = async (config) => {
      requests.push(config);
      const reply = replies.shift() ?? { status: 200, body: '{}' };

      if ('refused' in reply) {
        throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
      }

      const response: AxiosResponse = {
        data: reply.body,
        status: reply.status,
        statusText: reply.status < 400 ? 'OK' : 'Error',
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response,
        );
      }
      return response;
    };
  }

  function sentPayload(index = 0): unknown {
    return JSON.parse(String(requests[index]?.data));
  }

  beforeEach(() => {
    requests = [];
    http = createRegistryHttpClient({
      origin: 'https://registry.test',
      referer: 'https://registry.test/public-register',
      userAgent: 'test-agent',
      timeoutMs: 1000,
    });
    client = new PublicRegisterClient(http, testOptions, silentLogger);
  });

  describe('listCompanies()', () => {
    it('should post the listing payload with the offset to the API URL', async () => {
      replyWith({ status: 200, body: JSON.stringify({ Data: { companyList: [] } }) });

      await client.listCompanies(400);

      expect(requests).toHaveLength(1);
      expect(requests[0]?.method).toBe('post');
      expect(requests[0]?.url).toBe('https://registry.test/api/handleRequest');
      expect(sentPayload()).toEqual({
        name: '',
        licenseType: '',
        licenseNo: '',
        status: '',
        offset: 400,
        slug: '/CRM/public-register',
        method: 'POST',
      });
    });

    it('should send the browser-like header set', async () => {
      replyWith({ status: 200, body: '{}' });

      await client.listCompanies(0);

      const headers = requests[0]?.headers;
      expect(headers?.get('Content-Type')).toBe('text/plain;charset=UTF-8');
      expect(headers?.get('Accept')).toBe('*/*');
      expect(headers?.get('User-Agent')).toBe('test-agent');
      expect(headers?.get('Origin')).toBe('https://registry.test');
      expect(headers?.get('Referer')).toBe('https://registry.test/public-register');
    });

    it('should return the companyList records', async () => {
      const companies = [makeCompany('A'), makeCompany('B')];
      replyWith({ status: 200, body: JSON.stringify({ Data: { companyList: companies } }) });

      const result = await client.listCompanies(0);

      expect(result._unsafeUnwrap()).toEqual(companies);
    });

    it('should read an envelope without Data.companyList as an empty page', async () => {
      replyWith({ status: 200, body: JSON.stringify({ Data: {} }) }, { status: 200, body: '{}' });

      expect((await client.listCompanies(0))._unsafeUnwrap()).toEqual([]);
      expect((await client.listCompanies(200))._unsafeUnwrap()).toEqual([]);
    });

    it('should report a companyList that is not a list of objects as malformed', async () => {
      replyWith({ status: 200, body: JSON.stringify({ Data: { companyList: 'none' } }) });

      const result = await client.listCompanies(200);

      expect(result._unsafeUnwrapErr()).toEqual({
        kind: 'malformed',
        message: 'listing at offset 200 does not match the expected envelope',
      });
    });

    it('should report a non-JSON body as malformed', async () => {
      replyWith({ status: 200, body: '<html>Maintenance</html>' });

      const result = await client.listCompanies(0);

      expect(result._unsafeUnwrapErr()).toEqual({
        kind: 'malformed',
        message: 'response body is not valid JSON',
      });
    });

    it('should report a non-2xx answer with its status', async () => {
      replyWith({ status: 503, body: '' });

      const result = await client.listCompanies(0);

      expect(result._unsafeUnwrapErr()).toEqual({
        kind: 'http',
        status: 503,
        message: 'Request failed with status code 503',
      });
    });

    it('should report a connection failure as a transport failure', async () => {
      replyWith({ refused: true });

      const result = await client.listCompanies(0);

      expect(result._unsafeUnwrapErr()).toEqual({
        kind: 'transport',
        message: 'connect ECONNREFUSED 127.0.0.1:443',
      });
    });
  });

  describe('fetchCompanyDetail()', () => {
    it('should post a GET-dispatched payload with the record id in the slug', async () => {
      replyWith({ status: 200, body: '{}' });

      await client.fetchCompanyDetail('a0B000001');

      expect(sentPayload()).toEqual({
        slug: '/CRM/public-register?recordId=a0B000001',
        method: 'GET',
      });
    });

    it('should percent-encode the record id', async () => {
      replyWith({ status: 200, body: '{}' });

      await client.fetchCompanyDetail('a/b c');

      expect(sentPayload()).toEqual({
        slug: '/CRM/public-register?recordId=a%2Fb%20c',
        method: 'GET',
      });
    });

    it('should return the parsed payload as it is', async () => {
      const payload = { Data: { DIFCData: { PublicRegistry: [{ EntityStatus: 'Active' }] } } };
      replyWith({ status: 200, body: JSON.stringify(payload) });

      const result = await client.fetchCompanyDetail('A');

      expect(result._unsafeUnwrap()).toEqual(payload);
    });

    it('should pass a body the transport already decoded through unchanged', async () => {
      replyWith({ status: 200, body: { Data: null } });

      const result = await client.fetchCompanyDetail('A');

      expect(result._unsafeUnwrap()).toEqual({ Data: null });
    });

    it('should report failures the same way as the listing', async () => {
      replyWith({ status: 404, body: '' }, { status: 200, body: 'not json' });

      expect((await client.fetchCompanyDetail('A'))._unsafeUnwrapErr()).toMatchObject({
        kind: 'http',
        status: 404,
      });
      expect((await client.fetchCompanyDetail('B'))._unsafeUnwrapErr()).toMatchObject({
        kind: 'malformed',
      });
    });
  });
});

describe('describeFailure()', () => {
  it('should describe each failure kind in one line', () => {
    expect(describeFailure({ kind: 'transport', message: 'timeout of 1000ms exceeded' })).toBe(
      'request failed: timeout of 1000ms exceeded',
    );
    expect(describeFailure({ kind: 'http', status: 502, message: 'Bad Gateway' })).toBe(
      'HTTP 502: Bad Gateway',
    );
    expect(describeFailure({ kind: 'malformed', message: 'response body is not valid JSON' })).toBe(
      'unexpected response: response body is not valid JSON',
    );
  });
});
