/** Any value JSON can carry. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Variables mapping sent alongside a query. */
export type GraphQLVariables = Record<string, JsonValue>;

/** Body of a GraphQL-over-HTTP POST. */
export interface GraphQLPayload {
  query: string;
  variables: GraphQLVariables;
}
