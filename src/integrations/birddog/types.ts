/**
 * BirdDog Integration Types
 *
 * Configuration, request parameter and response record types for the
 * BirdDog HR REST API client.
 */

import type { Secret } from './Secret.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export type BirdDogApiVersion = 'v1' | 'v2';

export type BirdDogTlsVersion = 'TLSv1.2' | 'TLSv1.3';

export type BirdDogLogger = Pick<Console, 'log' | 'error'>;

export interface BirdDogConfig {
  /** API root, defaults to https://api.birddoghr.com */
  baseUrl?: string;
  /** Version path segment. v1 is supported on a best-effort basis by the API */
  apiVersion?: BirdDogApiVersion;
  /** Per-request timeout in milliseconds (default 30000) */
  timeoutMs?: number;
  /** Lowest TLS version the client will negotiate (default TLSv1.2) */
  minTlsVersion?: BirdDogTlsVersion;
  /** Replaces the HTTPS transport, mainly for tests */
  fetch?: FetchLike;
  logger?: BirdDogLogger;
  /** Clock used for the default employee search date */
  now?: () => Date;
}

export interface ResolvedBirdDogConfig {
  baseUrl: string;
  apiVersion: BirdDogApiVersion;
  timeoutMs: number;
  minTlsVersion: BirdDogTlsVersion;
}

// =============================================================================
// TRANSPORT
// =============================================================================

export type HttpMethod = 'GET' | 'POST';

export interface BirdDogHttpRequestInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface BirdDogHttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: BirdDogHttpRequestInit) => Promise<BirdDogHttpResponse>;

// =============================================================================
// CREDENTIALS
// =============================================================================

export interface BirdDogCredentials {
  apiKey: string;
  userName: string;
  password: Secret;
}

// =============================================================================
// REQUEST PARAMETERS
// =============================================================================

/** Per-call overrides of the client's base URL and API version */
export interface BirdDogCallOverrides {
  apiVersion?: BirdDogApiVersion;
  baseUrl?: string;
}

export interface AcquireAccessTokenParams extends BirdDogCredentials, BirdDogCallOverrides {}

export interface AuthenticatedParams extends BirdDogCallOverrides {
  /** Token returned by acquireAccessToken */
  accessToken: string;
}

export interface ListJobCandidatesParams extends AuthenticatedParams {
  disposition?: string;
  /** Lookback window in days; 0 returns every candidate */
  numDays?: number;
}

export interface ListEmployeesParams extends AuthenticatedParams {
  /** Defaults to "incomplete" */
  disposition?: string;
  /** A Date is formatted as MM/dd/yyyy; strings are sent as given. Defaults to today */
  searchDate?: Date | string;
  /** Defaults to "hiredate" */
  searchDateType?: string;
}

export interface ListTalentUsersParams extends AuthenticatedParams {
  userName?: string;
}

export interface UserNamesParams extends AuthenticatedParams {
  /** Non-empty, sent as userName[0], userName[1], ... in this order */
  userNames: readonly string[];
}

export interface GetEmployeeDocumentParams extends AuthenticatedParams {
  userName: string;
  documentType: string;
  documentSubType?: string;
}

// =============================================================================
// RESPONSE RECORDS
// =============================================================================

// Record layouts are owned by the remote API and passed through untouched.
export type BirdDogRecord = Record<string, unknown>;

export type JobCandidate = BirdDogRecord;
export type Employee = BirdDogRecord;
export type TalentUser = BirdDogRecord;
export type EmployeeCertification = BirdDogRecord;
export type LearningTranscript = BirdDogRecord;
export type EmployeeDocument = BirdDogRecord;

export type ResponseEnvelope = BirdDogRecord;
