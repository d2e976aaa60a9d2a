/**
 * The subset of an OpenAPI 3.0 / 3.1 document the IR compiler reads.
 *
 * Both `OpenAPIV3.Document` and `OpenAPIV3_1.Document` from openapi-types are
 * assignable to `ApiDocument`, so loaded documents flow in without casts and
 * tests can write documents as plain literals.
 */

export interface ReferenceNode {
  $ref: string;
}

export interface DiscriminatorNode {
  propertyName: string;
  mapping?: Record<string, string>;
}

/**
 * A JSON Schema / OpenAPI schema object, or a `$ref` to one
 */
export interface SchemaNode {
  $ref?: string;
  type?: string | string[];
  format?: string;
  nullable?: boolean;
  title?: string;
  description?: string;
  deprecated?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  default?: unknown;
  example?: unknown;
  examples?: unknown;
  enum?: unknown[];
  const?: unknown;
  properties?: Record<string, SchemaNode>;
  required?: string[];
  additionalProperties?: boolean | SchemaNode;
  items?: SchemaNode;
  oneOf?: SchemaNode[];
  anyOf?: SchemaNode[];
  allOf?: SchemaNode[];
  not?: SchemaNode;
  discriminator?: DiscriminatorNode;
}

export interface ParameterNode {
  name: string;
  in: string;
  required?: boolean;
  description?: string;
  schema?: SchemaNode;
}

export interface MediaTypeNode {
  schema?: SchemaNode;
}

export interface RequestBodyNode {
  description?: string;
  required?: boolean;
  content: Record<string, MediaTypeNode>;
}

export interface ResponseNode {
  description?: string;
  content?: Record<string, MediaTypeNode>;
}

export interface OperationNode {
  operationId?: string;
  tags?: string[];
  summary?: string;
  description?: string;
  deprecated?: boolean;
  parameters?: (ReferenceNode | ParameterNode)[];
  requestBody?: ReferenceNode | RequestBodyNode;
  responses?: Record<string, ReferenceNode | ResponseNode>;
}

export const httpMethods = [
  "get",
  "put",
  "post",
  "delete",
  "options",
  "head",
  "patch",
  "trace",
] as const;

export type HttpMethod = (typeof httpMethods)[number];

export type PathItemNode = {
  parameters?: (ReferenceNode | ParameterNode)[];
} & {
  [M in HttpMethod]?: OperationNode;
};

export interface SecuritySchemeNode {
  type: string;
  scheme?: string;
  bearerFormat?: string;
  in?: string;
  name?: string;
  openIdConnectUrl?: string;
}

export interface ComponentsNode {
  schemas?: Record<string, SchemaNode>;
  parameters?: Record<string, ReferenceNode | ParameterNode>;
  requestBodies?: Record<string, ReferenceNode | RequestBodyNode>;
  responses?: Record<string, ReferenceNode | ResponseNode>;
  securitySchemes?: Record<string, ReferenceNode | SecuritySchemeNode>;
}

export interface ApiDocument {
  openapi: string;
  info?: { title?: string; version?: string };
  paths?: Record<string, PathItemNode | undefined>;
  components?: ComponentsNode;
}
