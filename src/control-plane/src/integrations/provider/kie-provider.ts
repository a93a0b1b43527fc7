/**
 * HTTP adapter for the Kie jobs API
 *
 * POST {baseUrl}/jobs/createTask  { model, input } -> data.taskId
 * GET  {baseUrl}/jobs/recordInfo?taskId=...        -> data.state, data.resultJson
 */

import { z } from 'zod';
import { getLogger } from '../../utils/logger.js';
import { ProviderError } from '../../utils/errors.js';
import type { FailInfo, ProviderTaskStatus } from '../../types/job.js';
import {
  normalizeProviderStatus,
  type ProviderClient,
  type ProviderStatusRecord,
} from './provider-client.js';

const EnvelopeSchema = z
  .object({
    code: z.number().optional(),
    msg: z.string().optional(),
    data: z.unknown().optional(),
  })
  .passthrough();

const CreateTaskDataSchema = z.object({
  taskId: z.string().min(1),
});

const RecordDataSchema = z
  .object({
    state: z.string().nullish(),
    status: z.string().nullish(),
    resultJson: z.union([z.string(), z.record(z.unknown())]).nullish(),
    failCode: z.union([z.string(), z.number()]).nullish(),
    failMsg: z.string().nullish(),
  })
  .passthrough();

const ResultSchema = z
  .object({
    resultUrls: z.array(z.unknown()).optional(),
  })
  .passthrough();

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface KieProviderOptions {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly timeoutMs: number;
  readonly fetchFn?: FetchFn;
}

export class KieProviderClient implements ProviderClient {
  readonly name = 'kie';
  private readonly logger = getLogger().child({ service: 'KieProviderClient' });
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: KieProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async createTask(providerModel: string, input: Record<string, unknown>): Promise<string> {
    const envelope = await this.request('createTask', `${this.baseUrl}/jobs/createTask`, {
      method: 'POST',
      body: JSON.stringify({ model: providerModel, input }),
    });

    const data = CreateTaskDataSchema.safeParse(envelope['data']);
    if (!data.success) {
      throw new ProviderError('Kie createTask returned no task id', 502, { response: envelope });
    }

    this.logger.debug({ providerModel, providerTaskId: data.data.taskId }, 'Provider task created');
    return data.data.taskId;
  }

  async getTask(providerTaskId: string): Promise<ProviderStatusRecord> {
    const query = new URLSearchParams({ taskId: providerTaskId });
    return this.request('recordInfo', `${this.baseUrl}/jobs/recordInfo?${query.toString()}`, {
      method: 'GET',
    });
  }

  extractStatus(record: ProviderStatusRecord): ProviderTaskStatus {
    const data = this.recordData(record);
    return normalizeProviderStatus(data?.state ?? data?.status ?? '');
  }

  extractResultUrls(record: ProviderStatusRecord): string[] {
    const raw = this.recordData(record)?.resultJson;
    if (raw === undefined || raw === null) {
      return [];
    }

    let parsed: unknown = raw;
    if (typeof raw === 'string') {
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        this.logger.warn({ error }, 'Failed to parse provider resultJson');
        return [];
      }
    }

    const result = ResultSchema.safeParse(parsed);
    if (!result.success) {
      return [];
    }
    return (result.data.resultUrls ?? []).filter((url): url is string => typeof url === 'string');
  }

  extractFailInfo(record: ProviderStatusRecord): FailInfo {
    const data = this.recordData(record);
    const code = data?.failCode;
    return {
      code: code !== undefined && code !== null && code !== '' ? String(code) : 'provider_failed',
      message: data?.failMsg ?? 'Provider reported failure',
    };
  }

  private recordData(record: ProviderStatusRecord): z.infer<typeof RecordDataSchema> | undefined {
    const data = RecordDataSchema.safeParse(record['data']);
    return data.success ? data.data : undefined;
  }

  private async request(
    operation: string,
    url: string,
    init: RequestInit
  ): Promise<z.infer<typeof EnvelopeSchema>> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        ...init,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Kie ${operation} request failed: ${message}`, null);
    }

    const text = await response.text();

    if (!response.ok) {
      throw new ProviderError(`Kie ${operation} error ${response.status}: ${text}`, response.status);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new ProviderError(`Kie ${operation} returned invalid JSON`, 502);
    }

    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new ProviderError(`Kie ${operation} returned an unexpected body`, 502);
    }

    // The API reports some failures in the body with HTTP 200
    const code = envelope.data.code;
    if (code !== undefined && code !== 200) {
      throw new ProviderError(
        `Kie ${operation} error ${code}: ${envelope.data.msg ?? 'unknown error'}`,
        code
      );
    }

    return envelope.data;
  }
}
