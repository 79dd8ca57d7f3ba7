/**
 * Client for the Configuration Manager AdminService (WMI route).
 *
 * Only the three calls the sync needs: list the site's distribution points,
 * list the content a distribution point holds, and distribute a package to a
 * distribution point. Responses are OData collections (`{ value: [...] }`).
 */

import axios, { type AxiosRequestConfig } from 'axios';
import https from 'https';
import type { DpSyncConfig } from './config.js';
import type { SyncItem } from './sync-types.js';
import { errorMessage } from './sync-errors.js';
import { logger } from './logger.js';

export interface DistributionPoint {
  serverName: string;
  nalPath: string;
  siteCode: string;
  description?: string;
  isPullDistributionPoint: boolean;
}

interface ODataCollection<T> {
  value: T[];
}

interface DistributionPointInfoRow {
  ServerName: string;
  NALPath: string;
  SiteCode: string;
  Description?: string | null;
  IsPullDP?: boolean | null;
}

interface DPContentInfoRow {
  PackageID: string;
  Name?: string | null;
  ObjectType: number;
  NALPath: string;
}

type ClientConfig = Pick<
  DpSyncConfig,
  'siteServer' | 'siteCode' | 'token' | 'username' | 'password' | 'insecureTls' | 'requestTimeoutMs'
>;

/**
 * Quote a value as an OData string literal
 */
export function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function extractServiceMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim()) {
    return data.trim();
  }
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }

  // OData error envelope: { error: { code, message } }
  if ('error' in data && typeof data.error === 'object' && data.error !== null
    && 'message' in data.error && typeof data.error.message === 'string') {
    return data.error.message;
  }
  if ('Message' in data && typeof data.Message === 'string') {
    return data.Message;
  }
  if ('message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}

/**
 * Turn an AdminService failure into a one-line, operator-facing reason
 */
export function describeApiError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return errorMessage(error);
  }

  const status = error.response?.status;
  if (status === 401) {
    return 'Authentication failed (401): check DPSYNC_TOKEN or DPSYNC_USERNAME/DPSYNC_PASSWORD';
  }
  if (status === 403) {
    return 'Access denied (403): the account needs a Configuration Manager role that can distribute content';
  }
  if (status) {
    const detail = extractServiceMessage(error.response?.data) || error.response?.statusText || error.message;
    return `AdminService returned ${status}: ${detail}`;
  }
  return `Could not reach AdminService: ${error.message}`;
}

export class AdminServiceClient {
  readonly baseUrl: string;
  private readonly config: ClientConfig;
  private readonly httpsAgent?: https.Agent;

  constructor(config: ClientConfig) {
    this.config = config;
    this.baseUrl = `https://${config.siteServer}/AdminService/wmi/`;
    if (config.insecureTls) {
      this.httpsAgent = new https.Agent({ rejectUnauthorized: false });
    }
  }

  private requestConfig(extra: AxiosRequestConfig = {}, extraHeaders: Record<string, string> = {}): AxiosRequestConfig {
    const headers: Record<string, string> = { Accept: 'application/json', ...extraHeaders };
    const { token, username, password } = this.config;

    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    return {
      timeout: this.config.requestTimeoutMs,
      headers,
      auth: !token && username ? { username, password: password ?? '' } : undefined,
      httpsAgent: this.httpsAgent,
      ...extra,
    };
  }

  private async getCollection<T>(wmiClass: string, params: Record<string, string>): Promise<T[]> {
    const url = `${this.baseUrl}${wmiClass}`;
    logger.verbose(`[AdminService] GET ${wmiClass} ${JSON.stringify(params)}`);

    let data: ODataCollection<T> | undefined;
    try {
      const response = await axios.get<ODataCollection<T>>(url, this.requestConfig({ params }));
      data = response.data;
    } catch (error) {
      throw new Error(describeApiError(error), { cause: error });
    }

    if (!data || !Array.isArray(data.value)) {
      throw new Error(`Unexpected AdminService response for ${wmiClass}: missing "value" collection`);
    }
    return data.value;
  }

  /**
   * Distribution points of the configured site, sorted by server name
   */
  async listDistributionPoints(): Promise<DistributionPoint[]> {
    const rows = await this.getCollection<DistributionPointInfoRow>('SMS_DistributionPointInfo', {
      $filter: `SiteCode eq ${odataString(this.config.siteCode)}`,
    });

    return rows
      .map(row => ({
        serverName: row.ServerName,
        nalPath: row.NALPath,
        siteCode: row.SiteCode,
        description: row.Description || undefined,
        isPullDistributionPoint: row.IsPullDP === true,
      }))
      .sort((a, b) => a.serverName.localeCompare(b.serverName));
  }

  /**
   * Content of one object type held by a distribution point, sorted by name
   */
  async getDistributedContent(nalPath: string, objectType: number): Promise<SyncItem[]> {
    const rows = await this.getCollection<DPContentInfoRow>('SMS_DPContentInfo', {
      $filter: `NALPath eq ${odataString(nalPath)} and ObjectType eq ${objectType}`,
    });

    return rows
      .map(row => ({ id: row.PackageID, name: row.Name || row.PackageID }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Ask the site to distribute a package to a distribution point
   */
  async distributeContent(packageId: string, targetNalPath: string, signal?: AbortSignal): Promise<void> {
    const url = `${this.baseUrl}SMS_DistributionPoint`;
    const body = {
      PackageID: packageId,
      ServerNALPath: targetNalPath,
      SiteCode: this.config.siteCode,
    };

    try {
      await axios.post(url, body, this.requestConfig({ signal }, { 'Content-Type': 'application/json' }));
    } catch (error) {
      throw new Error(describeApiError(error), { cause: error });
    }
  }
}
