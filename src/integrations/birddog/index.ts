/**
 * BirdDog Integration Module
 *
 * Client for the BirdDog HR REST API:
 * - Access token acquisition with API key + user credentials
 * - Job candidates and onboarding employees
 * - Talent users, certifications and learning transcripts
 * - Employee documents
 */

// Types
export type {
  BirdDogApiVersion,
  BirdDogTlsVersion,
  BirdDogLogger,
  BirdDogConfig,
  ResolvedBirdDogConfig,
  FetchLike,
  BirdDogHttpRequestInit,
  BirdDogHttpResponse,
  BirdDogCredentials,
  BirdDogCallOverrides,
  AcquireAccessTokenParams,
  AuthenticatedParams,
  ListJobCandidatesParams,
  ListEmployeesParams,
  ListTalentUsersParams,
  UserNamesParams,
  GetEmployeeDocumentParams,
  BirdDogRecord,
  JobCandidate,
  Employee,
  TalentUser,
  EmployeeCertification,
  LearningTranscript,
  EmployeeDocument,
} from './types.js';

// Client
export {
  BirdDogClient,
  DEFAULT_EMPLOYEE_DISPOSITION,
  DEFAULT_SEARCH_DATE_TYPE,
  initializeBirdDogClient,
  getBirdDogClient,
  initializeBirdDogClientFromEnv,
} from './BirdDogClient.js';

// Configuration
export {
  DEFAULT_BASE_URL,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MIN_TLS_VERSION,
  resolveBirdDogConfig,
  loadBirdDogConfigFromEnv,
  loadBirdDogCredentialsFromEnv,
  isBirdDogConfigured,
} from './config.js';

// Errors
export {
  BirdDogError,
  BirdDogTransportError,
  BirdDogHttpError,
  BirdDogDecodeError,
  BirdDogArgumentError,
  BirdDogConfigError,
} from './errors.js';
export type { BirdDogErrorCode, BirdDogErrorOptions } from './errors.js';

// Credentials
export { Secret } from './Secret.js';

// Query helpers
export { buildQueryString, indexedParams, formatSearchDate } from './query.js';
export type { QueryPair } from './query.js';
