// Error types and handling for the refinement workflow

export enum ErrorCategory {
  TRANSPORT = 'transport',
  SCHEMA_VIOLATION = 'schema_violation',
  LOGICAL = 'logical',
  LLM_ERROR = 'llm_error',
  RATE_LIMIT = 'rate_limit',
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',
  VALIDATION = 'validation',
  UNKNOWN = 'unknown'
}

export interface AgentError {
  category: ErrorCategory;
  message: string;
  userMessage: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export class AgentErrorClass extends Error implements AgentError {
  category: ErrorCategory;
  userMessage: string;
  retryable: boolean;
  details?: Record<string, unknown>;

  constructor(error: AgentError) {
    super(error.message);
    this.name = 'AgentError';
    this.category = error.category;
    this.userMessage = error.userMessage;
    this.retryable = error.retryable;
    this.details = error.details;
  }
}

// The three categories a stage can report back to the controller
export type StageErrorCategory =
  | ErrorCategory.TRANSPORT
  | ErrorCategory.SCHEMA_VIOLATION
  | ErrorCategory.LOGICAL;

export interface StageFailure {
  category: StageErrorCategory;
  message: string;
}

// Error factory functions
export const createTransportError = (service: string, details?: string): AgentErrorClass => {
  return new AgentErrorClass({
    category: ErrorCategory.TRANSPORT,
    message: `${service} call failed: ${details || 'Unknown error'}`,
    userMessage: `Couldn't reach ${service} — try again in a minute?`,
    retryable: true,
    details: { service, details }
  });
};

export const createTimeoutError = (service: string, timeoutMs: number): AgentErrorClass => {
  return new AgentErrorClass({
    category: ErrorCategory.TRANSPORT,
    message: `${service} call timed out after ${timeoutMs}ms`,
    userMessage: `${service} took too long to answer — try again?`,
    retryable: true,
    details: { service, timeoutMs }
  });
};

export const createSchemaError = (details: string): AgentErrorClass => {
  return new AgentErrorClass({
    category: ErrorCategory.SCHEMA_VIOLATION,
    message: `Schema violation: ${details}`,
    userMessage: "The model answered in a shape I couldn't use — retrying should help.",
    retryable: true,
    details: { details }
  });
};

export const createLogicalError = (details: string): AgentErrorClass => {
  return new AgentErrorClass({
    category: ErrorCategory.LOGICAL,
    message: details,
    userMessage: 'The workflow is missing something it needs to continue.',
    retryable: false,
    details: { details }
  });
};

export const createLLMError = (details?: string): AgentErrorClass => {
  return new AgentErrorClass({
    category: ErrorCategory.LLM_ERROR,
    message: `LLM error: ${details || 'Unknown'}`,
    userMessage: "I'm having trouble thinking — try again?",
    retryable: true,
    details: { details }
  });
};

export const createRateLimitError = (service: string, retryAfterSeconds?: number): AgentErrorClass => {
  const retryText = retryAfterSeconds ? `in ${retryAfterSeconds}s` : 'shortly';
  return new AgentErrorClass({
    category: ErrorCategory.RATE_LIMIT,
    message: `${service} rate limited`,
    userMessage: `${service} is rate limiting — try again ${retryText}`,
    retryable: true,
    details: { service, retryAfterSeconds }
  });
};

export const createNotFoundError = (entityType: string, query: string): AgentErrorClass => {
  return new AgentErrorClass({
    category: ErrorCategory.NOT_FOUND,
    message: `${entityType} not found: ${query}`,
    userMessage: `I couldn't find a ${entityType} matching "${query}".`,
    retryable: false,
    details: { entityType, query }
  });
};

export const createConflictError = (entityType: string, id: string): AgentErrorClass => {
  return new AgentErrorClass({
    category: ErrorCategory.CONFLICT,
    message: `${entityType} ${id} was modified by another writer`,
    userMessage: 'Someone else updated this session at the same time — try again.',
    retryable: true,
    details: { entityType, id }
  });
};

export const createValidationError = (message: string): AgentErrorClass => {
  return new AgentErrorClass({
    category: ErrorCategory.VALIDATION,
    message: `Validation error: ${message}`,
    userMessage: message,
    retryable: false
  });
};

const isTimeout = (error: Error): boolean =>
  error.name === 'TimeoutError' || error.name === 'AbortError';

// Collapse anything a stage caught into one of the stage categories.
// Provider, rate-limit and unknown failures all count as transport.
export const toStageFailure = (prefix: string, error: unknown): StageFailure => {
  if (error instanceof AgentErrorClass) {
    const category =
      error.category === ErrorCategory.SCHEMA_VIOLATION || error.category === ErrorCategory.LOGICAL
        ? error.category
        : ErrorCategory.TRANSPORT;
    return { category, message: `${prefix}: ${error.message}` };
  }

  if (error instanceof Error) {
    const message = isTimeout(error) ? `call timed out (${error.message})` : error.message;
    return { category: ErrorCategory.TRANSPORT, message: `${prefix}: ${message}` };
  }

  return { category: ErrorCategory.TRANSPORT, message: `${prefix}: ${String(error)}` };
};

// Error handler for user-facing messages
export const getUserFriendlyError = (error: unknown): string => {
  if (error instanceof AgentErrorClass) {
    return error.userMessage;
  }

  if (error instanceof Error) {
    if (error.message.includes('ECONNREFUSED') || error.message.includes('ETIMEDOUT')) {
      return "Couldn't connect to the service — try again in a minute?";
    }
    if (error.message.includes('401') || error.message.includes('Unauthorized')) {
      return 'Authentication failed — credentials may need updating.';
    }
    if (error.message.includes('429') || error.message.includes('Too Many Requests')) {
      return 'Too many requests — please wait a moment.';
    }
    if (error.message.includes('API key')) {
      return 'API key is missing or invalid — please check configuration.';
    }
  }

  return 'Something went wrong — please try again.';
};
