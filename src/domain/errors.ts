/**
 * Error taxonomy for the simulator.
 *
 * Rejected and constraint-violated outcomes are statuses on a node, not
 * errors. The classes here cover malformed input and writes the model
 * forbids; the runner turns them into `error` nodes.
 */

export type SimulationErrorCode =
  | 'validation'
  | 'unknown_level'
  | 'immutable_write'
  | 'domain'
  | 'required_postcondition'
  | 'knowledge_base';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = 'SimulationError';
    this.code = code;
  }
}

/**
 * Missing required parameter, parameter outside its choices, or an action
 * name the knowledge base does not define.
 */
export class ValidationError extends SimulationError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

export class UnknownLevelError extends SimulationError {
  readonly spaceId: string;
  readonly level: string;

  constructor(spaceId: string, level: string) {
    super('unknown_level', `Level '${level}' is not defined in space '${spaceId}'`);
    this.name = 'UnknownLevelError';
    this.spaceId = spaceId;
    this.level = level;
  }
}

export class ImmutableWriteError extends SimulationError {
  readonly attribute: string;

  constructor(attribute: string) {
    super('immutable_write', `Attribute '${attribute}' is not mutable`);
    this.name = 'ImmutableWriteError';
    this.attribute = attribute;
  }
}

/**
 * A write whose value is not a level of the attribute's space.
 */
export class DomainError extends SimulationError {
  readonly attribute: string;

  constructor(attribute: string, value: string, spaceId: string) {
    super(
      'domain',
      `Value '${value}' for '${attribute}' is not in space '${spaceId}'`
    );
    this.name = 'DomainError';
    this.attribute = attribute;
  }
}

export class RequiredPostconditionError extends SimulationError {
  constructor(condition: string) {
    super(
      'required_postcondition',
      `Postcondition '${condition}' does not hold and has no else branch`
    );
    this.name = 'RequiredPostconditionError';
  }
}

export interface KnowledgeBaseIssue {
  /** Source file, when the definition came from a file */
  file?: string;
  /** Space, object type or action the issue belongs to */
  subject: string;
  rule: string;
  message: string;
}

export class KnowledgeBaseError extends SimulationError {
  readonly issues: readonly KnowledgeBaseIssue[];

  constructor(issues: readonly KnowledgeBaseIssue[]) {
    const first = issues[0];
    const summary = first ? `${first.subject}: ${first.message}` : 'no details';
    super(
      'knowledge_base',
      `Knowledge base is invalid (${issues.length} issue(s)); first: ${summary}`
    );
    this.name = 'KnowledgeBaseError';
    this.issues = issues;
  }
}

/**
 * Errors that stop the whole run when raised while applying an action.
 */
export function isHaltingError(error: SimulationError): boolean {
  return (
    error.code === 'validation' ||
    error.code === 'immutable_write' ||
    error.code === 'domain' ||
    error.code === 'unknown_level'
  );
}
