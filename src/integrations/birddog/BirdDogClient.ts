/**
 * BirdDog API Client
 *
 * Thin client for the BirdDog HR REST API. One method per endpoint:
 * - Access token acquisition
 * - Job candidates
 * - Onboarding employees
 * - Talent module users
 * - Employee certifications and learning transcripts
 * - Employee documents
 *
 * Every call is a single stateless request. The caller acquires a token once
 * and passes it to each subsequent call; there is no caching, refresh, retry
 * or pagination.
 *
 * Auth header: `Authorization: BDToken <accessToken>`
 */

import { Agent, fetch as undiciFetch } from 'undici';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import {
  loadBirdDogConfigFromEnv,
  resolveBaseUrlOverride,
  resolveBirdDogConfig,
} from './config.js';
import {
  BirdDogArgumentError,
  BirdDogDecodeError,
  BirdDogHttpError,
  BirdDogTransportError,
} from './errors.js';
import { buildQueryString, formatSearchDate, indexedParams, type QueryPair } from './query.js';
import type {
  AcquireAccessTokenParams,
  BirdDogCallOverrides,
  BirdDogConfig,
  BirdDogLogger,
  EmployeeCertification,
  Employee,
  EmployeeDocument,
  FetchLike,
  GetEmployeeDocumentParams,
  HttpMethod,
  JobCandidate,
  LearningTranscript,
  ListEmployeesParams,
  ListJobCandidatesParams,
  ListTalentUsersParams,
  ResolvedBirdDogConfig,
  ResponseEnvelope,
  TalentUser,
  UserNamesParams,
} from './types.js';

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const recordSchema = z.record(z.unknown());
const recordListSchema = z.array(recordSchema);

const tokenSchema = z.string().min(1);

// The single-user endpoint may answer with one object instead of a list
const talentUsersSchema = z.union([
  recordListSchema,
  recordSchema.transform((user) => [user]),
]);

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_EMPLOYEE_DISPOSITION = 'incomplete';
export const DEFAULT_SEARCH_DATE_TYPE = 'hiredate';

// =============================================================================
// INTERNAL TYPES
// =============================================================================

interface RequestContext {
  method: HttpMethod;
  path: string;
  requestId: string;
}

type EnvelopeDecoder<T> = (envelope: ResponseEnvelope, context: RequestContext) => T;

interface RequestOptions<T> {
  overrides: BirdDogCallOverrides;
  accessToken?: string;
  query?: readonly QueryPair[];
  body?: () => string;
  decode: EnvelopeDecoder<T>;
}

function unwrapField<S extends z.ZodTypeAny>(field: string, schema: S): EnvelopeDecoder<z.output<S>> {
  return (envelope, context) => {
    const parsed = schema.safeParse(envelope[field]);
    if (!parsed.success) {
      throw new BirdDogDecodeError(
        `BirdDog response has no valid "${field}" field (${context.method} ${context.path})`,
        { field, path: context.path, issues: parsed.error.issues },
        { requestId: context.requestId }
      );
    }
    return parsed.data;
  };
}

const wholeEnvelope: EnvelopeDecoder<ResponseEnvelope> = (envelope) => envelope;

function requireText(value: string, name: string): void {
  if (value.trim() === '') {
    throw new BirdDogArgumentError(`${name} is required`, { parameter: name });
  }
}

function requireUserNames(userNames: readonly string[]): void {
  if (userNames.length === 0) {
    throw new BirdDogArgumentError('At least one user name is required', {
      parameter: 'userNames',
    });
  }
  userNames.forEach((userName, index) => requireText(userName, `userNames[${index}]`));
}

// =============================================================================
// BIRDDOG CLIENT
// =============================================================================

export class BirdDogClient {
  private config: ResolvedBirdDogConfig;
  private agent: Agent | null;
  private fetchImpl: FetchLike;
  private logger: BirdDogLogger;
  private now: () => Date;

  constructor(config: BirdDogConfig = {}) {
    this.config = resolveBirdDogConfig(config);
    this.logger = config.logger ?? console;
    this.now = config.now ?? (() => new Date());

    if (config.fetch) {
      this.agent = null;
      this.fetchImpl = config.fetch;
    } else {
      // TLS floor is per client, never a process-wide setting
      const agent = new Agent({ connect: { minVersion: this.config.minTlsVersion } });
      this.agent = agent;
      this.fetchImpl = (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
    }
  }

  // ===========================================================================
  // AUTHENTICATION
  // ===========================================================================

  /**
   * Exchange API key and user credentials for an access token.
   *
   * The password is revealed only while the request body is serialized.
   */
  async acquireAccessToken(params: AcquireAccessTokenParams): Promise<string> {
    requireText(params.apiKey, 'apiKey');
    requireText(params.userName, 'userName');

    return this.request('POST', '/accesstoken', {
      overrides: params,
      body: () =>
        JSON.stringify({
          apiKey: params.apiKey,
          userName: params.userName,
          password: params.password.reveal(),
        }),
      decode: unwrapField('token', tokenSchema),
    });
  }

  /**
   * Same as acquireAccessToken, then disposes the password whether or not the
   * call succeeded.
   */
  async acquireAccessTokenOnce(params: AcquireAccessTokenParams): Promise<string> {
    try {
      return await this.acquireAccessToken(params);
    } finally {
      params.password.dispose();
    }
  }

  // ===========================================================================
  // RECRUITING
  // ===========================================================================

  /**
   * Get job candidates, optionally limited to the last `numDays` days.
   *
   * Without a disposition the query carries only `numdays`.
   */
  async listJobCandidates(params: ListJobCandidatesParams): Promise<JobCandidate[]> {
    const numDays = params.numDays ?? 0;
    if (!Number.isInteger(numDays) || numDays < 0) {
      throw new BirdDogArgumentError('numDays must be a non-negative integer', {
        parameter: 'numDays',
        value: numDays,
      });
    }

    const query: QueryPair[] = [['numdays', String(numDays)]];
    if (params.disposition) query.push(['disp', params.disposition]);

    return this.request('GET', '/JobCandidates', {
      overrides: params,
      accessToken: params.accessToken,
      query,
      decode: unwrapField('candidates', recordListSchema),
    });
  }

  /**
   * Get onboarding applicants
   *
   * @example
   * // Incomplete onboarding for people hired today
   * const employees = await client.listEmployees({ accessToken });
   */
  async listEmployees(params: ListEmployeesParams): Promise<Employee[]> {
    const searchDate = params.searchDate ?? this.now();
    if (searchDate instanceof Date && Number.isNaN(searchDate.getTime())) {
      throw new BirdDogArgumentError('searchDate must be a valid date', {
        parameter: 'searchDate',
      });
    }

    return this.request('GET', '/Employees', {
      overrides: params,
      accessToken: params.accessToken,
      query: [
        ['disp', params.disposition || DEFAULT_EMPLOYEE_DISPOSITION],
        ['SearchDate', typeof searchDate === 'string' ? searchDate : formatSearchDate(searchDate)],
        ['SearchDateType', params.searchDateType || DEFAULT_SEARCH_DATE_TYPE],
      ],
      decode: unwrapField('employees', recordListSchema),
    });
  }

  // ===========================================================================
  // TALENT
  // ===========================================================================

  /**
   * Get every talent user, or one when `userName` is given.
   */
  async listTalentUsers(params: ListTalentUsersParams): Promise<TalentUser[]> {
    const decode = unwrapField('TalentUsers', talentUsersSchema);

    if (params.userName) {
      requireText(params.userName, 'userName');
      return this.request('GET', '/TalentUser', {
        overrides: params,
        accessToken: params.accessToken,
        query: [['userName', params.userName]],
        decode,
      });
    }

    return this.request('GET', '/TalentUsers', {
      overrides: params,
      accessToken: params.accessToken,
      decode,
    });
  }

  async listEmployeeCertifications(params: UserNamesParams): Promise<EmployeeCertification[]> {
    requireUserNames(params.userNames);

    return this.request('GET', '/EmployeeCertification', {
      overrides: params,
      accessToken: params.accessToken,
      query: indexedParams('userName', params.userNames),
      decode: unwrapField('employees', recordListSchema),
    });
  }

  async listEmployeeLearningTranscripts(params: UserNamesParams): Promise<LearningTranscript[]> {
    requireUserNames(params.userNames);

    return this.request('GET', '/EmployeeLearningTranscript', {
      overrides: params,
      accessToken: params.accessToken,
      query: indexedParams('userName', params.userNames),
      decode: unwrapField('transcripts', recordListSchema),
    });
  }

  // ===========================================================================
  // DOCUMENTS
  // ===========================================================================

  /**
   * Get one employee document. The document is the whole response body, so
   * nothing is unwrapped.
   */
  async getEmployeeDocument(params: GetEmployeeDocumentParams): Promise<EmployeeDocument> {
    requireText(params.userName, 'userName');
    requireText(params.documentType, 'documentType');

    const query: QueryPair[] = [
      ['userName', params.userName],
      ['documentType', params.documentType],
    ];
    if (params.documentSubType) query.push(['documentSubType', params.documentSubType]);

    return this.request('GET', '/GetEmployeeDocument', {
      overrides: params,
      accessToken: params.accessToken,
      query,
      decode: wholeEnvelope,
    });
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Release pooled connections held by the HTTPS dispatcher
   */
  async close(): Promise<void> {
    if (this.agent) {
      await this.agent.close();
    }
  }

  // ===========================================================================
  // HTTP CLIENT
  // ===========================================================================

  private async request<T>(method: HttpMethod, endpoint: string, options: RequestOptions<T>): Promise<T> {
    const baseUrl = options.overrides.baseUrl
      ? resolveBaseUrlOverride(options.overrides.baseUrl)
      : this.config.baseUrl;
    const version = options.overrides.apiVersion ?? this.config.apiVersion;
    const path = `/${version}${endpoint}`;
    const query = options.query?.length ? `?${buildQueryString(options.query)}` : '';
    const context: RequestContext = { method, path, requestId: uuid() };

    // The request id stays local: it only tags log lines and errors
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.accessToken !== undefined) {
      headers.Authorization = `BDToken ${options.accessToken}`;
    }

    let body: string | undefined;
    if (options.body) {
      headers['Content-Type'] = 'application/json';
      body = options.body();
    }

    this.logger.log(`[BirdDogClient] ${method} ${path} (request ${context.requestId})`);

    try {
      const response = await this.send(`${baseUrl}${path}${query}`, { method, headers, body }, context);

      if (!response.ok) {
        throw new BirdDogHttpError(response.status, response.statusText, response.text, context);
      }

      return options.decode(this.parseEnvelope(response.text, context), context);
    } catch (error) {
      this.logger.error(`[BirdDogClient] Request failed: ${method} ${path}`, error);
      throw error;
    }
  }

  private async send(
    url: string,
    init: { method: HttpMethod; headers: Record<string, string>; body?: string },
    context: RequestContext
  ): Promise<{ ok: boolean; status: number; statusText: string; text: string }> {
    const { timeoutMs } = this.config;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const text = await response.text();
      return { ok: response.ok, status: response.status, statusText: response.statusText, text };
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new BirdDogTransportError(
        `BirdDog request failed: ${context.method} ${context.path} ${reason}`,
        { method: context.method, path: context.path },
        { cause: error, requestId: context.requestId }
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private parseEnvelope(text: string, context: RequestContext): ResponseEnvelope {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new BirdDogDecodeError(
        `BirdDog response is not valid JSON (${context.method} ${context.path})`,
        { path: context.path },
        { cause: error, requestId: context.requestId }
      );
    }

    const envelope = recordSchema.safeParse(json);
    if (!envelope.success) {
      throw new BirdDogDecodeError(
        `BirdDog response is not a JSON object (${context.method} ${context.path})`,
        { path: context.path },
        { requestId: context.requestId }
      );
    }
    return envelope.data;
  }
}

// =============================================================================
// SINGLETON
// =============================================================================

let instance: BirdDogClient | null = null;

export function initializeBirdDogClient(config: BirdDogConfig = {}): BirdDogClient {
  instance = new BirdDogClient(config);
  return instance;
}

export function getBirdDogClient(): BirdDogClient {
  if (!instance) {
    throw new Error('BirdDogClient not initialized. Call initializeBirdDogClient first.');
  }
  return instance;
}

/**
 * Initialize BirdDog client from environment variables (and .env, if present)
 */
export function initializeBirdDogClientFromEnv(overrides: BirdDogConfig = {}): BirdDogClient {
  loadDotenv();
  const config = loadBirdDogConfigFromEnv(process.env);
  const logger = overrides.logger ?? console;
  logger.log(
    `[BirdDogClient] Using ${config.baseUrl ?? 'default base URL'} (${config.apiVersion ?? 'default version'})`
  );
  return initializeBirdDogClient({ ...config, ...overrides });
}
