/**
 * HTTP client for the remote license registry.
 *
 * Each call is a single GET with no retry and no caching; the transport's
 * default timeouts apply.
 */
import type { z } from 'zod';
import { LicenseDetailSchema, LicenseListSchema } from './schema.js';
import type { LicenseSummary, LicenseText } from '../types.js';
import { DEFAULT_REGISTRY_URL, DEFAULT_USER_AGENT } from '../config/schema.js';
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('registry');

export interface RegistryClientOptions {
  /** Listing endpoint; single licenses are fetched from `<baseUrl>/<key>` */
  baseUrl?: string;
  userAgent?: string;
}

export class LicenseRegistryClient {
  private readonly baseUrl: string;
  private readonly userAgent: string;

  constructor(options: RegistryClientOptions = {}) {
    this.baseUrl = (options.baseUrl || DEFAULT_REGISTRY_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
  }

  /**
   * List every license the registry offers.
   */
  async listLicenses(): Promise<LicenseSummary[]> {
    const entries = await this.getJson(this.baseUrl, LicenseListSchema);
    return entries.map((entry) => ({
      key: entry.key,
      displayName: entry.name,
      spdxId: entry.spdx_id,
    }));
  }

  /**
   * Fetch the template of one license.
   *
   * @throws RegistryError with status 404 in its details when the key is unknown
   */
  async fetchLicense(key: string): Promise<LicenseText> {
    const url = `${this.baseUrl}/${encodeURIComponent(key)}`;
    const detail = await this.getJson(url, LicenseDetailSchema, key);
    return { displayName: detail.name, body: detail.body };
  }

  private async getJson<T>(url: string, schema: z.ZodType<T>, key?: string): Promise<T> {
    log.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'application/vnd.github+json',
        },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RegistryError(
        ErrorCodes.REGISTRY_UNREACHABLE,
        `Could not reach license registry at ${url}: ${reason}`,
        { url }
      );
    }

    if (!response.ok) {
      const message = response.status === 404 && key !== undefined
        ? `Unknown license '${key}' (HTTP 404 from ${url})`
        : `License registry returned HTTP ${response.status} for ${url}`;
      throw new RegistryError(ErrorCodes.REGISTRY_HTTP_ERROR, message, {
        url,
        status: response.status,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch { /* body is not JSON */
      throw new RegistryError(
        ErrorCodes.REGISTRY_INVALID_RESPONSE,
        `License registry returned a body that is not JSON for ${url}`,
        { url }
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new RegistryError(
        ErrorCodes.REGISTRY_INVALID_RESPONSE,
        `Unexpected response shape from license registry for ${url}`,
        { url, issues: parsed.error.issues.map((issue) => issue.message) }
      );
    }

    return parsed.data;
  }
}
