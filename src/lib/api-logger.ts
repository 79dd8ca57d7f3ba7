/**
 * Axios interceptors that trace AdminService traffic in verbose mode.
 *
 * Requests show the method, the WMI class, any OData query options, a masked
 * Authorization header and the body. Responses show status and timing; OData
 * collections are reduced to a row count and the first few row keys, so a
 * listing of hundreds of packages stays one line.
 */

import axios, { type InternalAxiosRequestConfig, type AxiosResponse, type AxiosError } from 'axios';
import { isVerbose } from './logger.js';

const MAX_STRING_PREVIEW = 120;
const MAX_ARRAY_ITEMS = 3;
const MAX_DEPTH = 2;
const WMI_ROUTE = '/AdminService/wmi/';

/** Row properties that identify an AdminService object, in lookup order */
const ROW_KEYS = ['PackageID', 'ServerName', 'NALPath', 'Name'];

/**
 * Redact sensitive header values for safe console output.
 * Only Authorization (masked) and Content-Type are kept.
 */
function maskHeaders(headers: Record<string, unknown>): Record<string, string> {
  const safe: Record<string, string> = {};
  for (const [key, val] of Object.entries(headers)) {
    if (!val) continue;
    const strVal = String(val);
    if (key.toLowerCase() === 'authorization') {
      const parts = strVal.split(' ');
      safe[key] = parts.length === 2 ? `${parts[0]} ${parts[1].substring(0, 8)}…` : '***';
    } else if (key.toLowerCase() === 'content-type') {
      safe[key] = strVal;
    }
  }
  return safe;
}

/**
 * Compact, human-readable summary of a JSON-ish value.
 */
function summarise(value: unknown, depth = 0): string {
  if (value === null || value === undefined) return String(value);

  if (typeof value === 'string') {
    if (value.length <= MAX_STRING_PREVIEW) return JSON.stringify(value);
    return `${JSON.stringify(value.slice(0, MAX_STRING_PREVIEW))}… (${value.length} chars)`;
  }

  if (typeof value !== 'object' || value === null) return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (depth >= MAX_DEPTH) return `[…${value.length} items]`;
    const shown = value.slice(0, MAX_ARRAY_ITEMS).map(v => summarise(v, depth + 1));
    const more = value.length > MAX_ARRAY_ITEMS ? `, …+${value.length - MAX_ARRAY_ITEMS} more` : '';
    return `[${shown.join(', ')}${more}] (${value.length})`;
  }

  // OData metadata is noise in a preview
  const entries = Object.entries(value).filter(([key]) => !key.startsWith('@odata.'));
  if (entries.length === 0) return '{}';
  if (depth >= MAX_DEPTH) return `{${entries.length} keys}`;
  return `{ ${entries.map(([key, v]) => `${key}: ${summarise(v, depth + 1)}`).join(', ')} }`;
}

function rowKey(row: unknown): string {
  if (typeof row !== 'object' || row === null) {
    return summarise(row);
  }
  const record = new Map<string, unknown>(Object.entries(row));
  for (const key of ROW_KEYS) {
    const value = record.get(key);
    if (typeof value === 'string' && value) return value;
  }
  return summarise(row, MAX_DEPTH);
}

/**
 * One-line preview of a request or response body. OData collections
 * (`{ value: [...] }`) become "N row(s): key, key, key, …+M more".
 */
function formatPayload(data: unknown): string {
  if (data === undefined || data === null || data === '') return '(empty)';

  if (Buffer.isBuffer(data)) {
    return `<binary ${(data.length / 1024).toFixed(1)} KB>`;
  }

  if (typeof data === 'object' && data !== null && 'value' in data && Array.isArray(data.value)) {
    const rows: unknown[] = data.value;
    if (rows.length === 0) return '0 rows';
    const keys = rows.slice(0, MAX_ARRAY_ITEMS).map(rowKey).join(', ');
    const more = rows.length > MAX_ARRAY_ITEMS ? `, …+${rows.length - MAX_ARRAY_ITEMS} more` : '';
    return `${rows.length} row(s): ${keys}${more}`;
  }

  return summarise(data);
}

/**
 * Shorten an AdminService URL to its WMI class, e.g. "SMS_DPContentInfo"
 */
function wmiTarget(url: string | undefined): string {
  if (!url) return '?';
  const index = url.indexOf(WMI_ROUTE);
  return index === -1 ? url : url.slice(index + WMI_ROUTE.length) || '/';
}

function queryOptions(params: unknown): string {
  if (typeof params !== 'object' || params === null) return '';
  const parts = Object.entries(params)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length ? ` ${parts.join(' ')}` : '';
}

function describeRequest(config: InternalAxiosRequestConfig): string {
  const method = (config.method || 'GET').toUpperCase();
  const lines = [`→ ${method} ${wmiTarget(config.url)}${queryOptions(config.params)}`];

  const headers = maskHeaders(config.headers.toJSON());
  if (Object.keys(headers).length) {
    lines.push(`  headers: ${JSON.stringify(headers)}`);
  }
  if (config.data !== undefined && config.data !== null) {
    lines.push(`  body: ${formatPayload(config.data)}`);
  }
  return lines.join('\n');
}

const requestStartTimes = new WeakMap<InternalAxiosRequestConfig, number>();

function elapsed(config: InternalAxiosRequestConfig | undefined): string {
  if (!config) return '';
  const started = requestStartTimes.get(config);
  if (started === undefined) return '';
  requestStartTimes.delete(config);
  return ` (${Date.now() - started}ms)`;
}

function describeResponse(response: AxiosResponse): string {
  const method = (response.config.method || 'GET').toUpperCase();
  const line = `← ${response.status} ${method} ${wmiTarget(response.config.url)}${elapsed(response.config)}`;
  return response.status === 204 ? line : `${line}\n  body: ${formatPayload(response.data)}`;
}

function describeFailure(error: AxiosError): string {
  const method = (error.config?.method || '?').toUpperCase();
  const status = error.response?.status || 'NETWORK_ERROR';
  const line = `← ${status} ${method} ${wmiTarget(error.config?.url)}${elapsed(error.config)}`;
  return error.response?.data
    ? `${line}\n  body: ${formatPayload(error.response.data)}`
    : `${line}\n  error: ${error.message}`;
}

let registered = false;

/**
 * Register global axios interceptors for verbose AdminService logging.
 * Safe to call multiple times.
 */
export function registerApiLogger(): void {
  if (registered) return;
  registered = true;

  axios.interceptors.request.use(
    (config: InternalAxiosRequestConfig) => {
      if (isVerbose()) {
        requestStartTimes.set(config, Date.now());
        console.log(describeRequest(config));
      }
      return config;
    },
    (error: AxiosError) => {
      if (isVerbose()) {
        console.error(`→ REQUEST ERROR: ${error.message}`);
      }
      return Promise.reject(error);
    },
  );

  axios.interceptors.response.use(
    (response: AxiosResponse) => {
      if (isVerbose()) {
        console.log(describeResponse(response));
      }
      return response;
    },
    (error: AxiosError) => {
      if (isVerbose()) {
        console.error(describeFailure(error));
      }
      return Promise.reject(error);
    },
  );
}

export { summarise, maskHeaders, formatPayload, wmiTarget };
