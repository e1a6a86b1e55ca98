import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the service answers with a GraphQL `errors` list.
 */
export class GraphQLResponseError extends Error {
  /** GraphQLResponseError error-name */
  name = 'GraphQLResponseError';
  /** Messages from the `errors` list, in order */
  readonly messages: string[];

  constructor(messages: string[], opts?: ErrorOptions) {
    super(`error in graphql response: ${messages.join('; ')}`, opts);
    this.messages = messages;
  }
}

/**
 * Type guard for {@link GraphQLResponseError}.
 */
export function isGraphQLResponseError(error: unknown): error is GraphQLResponseError {
  return isErrorType(GraphQLResponseError, error);
}
