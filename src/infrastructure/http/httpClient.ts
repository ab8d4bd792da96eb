/**
 * Upstream HTTP Client Factory
 * Layer: Infrastructure
 *
 * Builds the axios instance every register request goes through. The header
 * set mirrors what the register's own web page sends; the server checks
 * Origin and Referer and refuses anything else. Bodies go out as
 * `text/plain` JSON text, which is how the page posts them too.
 *
 * Responses are read as text (`responseType: 'text'`) so the client can tell
 * a non-JSON body (an HTML error page, a truncated response) apart from a
 * JSON one instead of letting axios guess.
 */
import axios, { type AxiosInstance } from 'axios';

export interface RegistryHttpSettings {
  origin: string;
  referer: string;
  userAgent: string;
  timeoutMs: number;
}

export function createRegistryHttpClient(settings: RegistryHttpSettings): AxiosInstance {
  return axios.create({
    timeout: settings.timeoutMs,
    responseType: 'text',
    headers: {
      'Content-Type': 'text/plain;charset=UTF-8',
      Accept: '*/*',
      'User-Agent': settings.userAgent,
      Origin: settings.origin,
      Referer: settings.referer,
    },
  });
}
