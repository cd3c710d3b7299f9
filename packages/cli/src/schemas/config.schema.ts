/** Shape of `runway.json` as written by users; every field is optional. */
export interface RawConfig {
  readonly project?: {
    readonly name?: string
    readonly projectId?: string
    readonly region?: string
  }
  readonly build?: {
    readonly baseImage?: string
    readonly runtimeImage?: string
    readonly extraPackages?: readonly string[]
    readonly cargoChefVersion?: string
    readonly include?: readonly string[]
    readonly env?: Readonly<Record<string, string>>
  }
  readonly service?: {
    readonly memory?: string
    readonly cpu?: number
    readonly minInstances?: number
    readonly maxInstances?: number
    readonly concurrency?: number
    readonly port?: number
  }
  readonly deploy?: {
    readonly pollIntervalMs?: number
    readonly buildTimeoutMs?: number
    readonly deployTimeoutMs?: number
  }
}

const image = { type: "string", minLength: 1, pattern: "^\\S+$" } as const

export const configSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  additionalProperties: false,
  properties: {
    $schema: { type: "string" },
    project: {
      type: "object",
      additionalProperties: false,
      properties: {
        name: { type: "string", pattern: "^[a-z]([-a-z0-9]{0,61}[a-z0-9])?$" },
        projectId: { type: "string" },
        region: { type: "string" }
      }
    },
    build: {
      type: "object",
      additionalProperties: false,
      properties: {
        baseImage: image,
        runtimeImage: image,
        extraPackages: { type: "array", items: { type: "string", pattern: "^[a-z0-9][a-z0-9+.-]*$" } },
        cargoChefVersion: { type: "string", pattern: "^[0-9A-Za-z.+-]+$" },
        include: {
          type: "array",
          items: { type: "string", minLength: 1, pattern: "^(?!/)(?!(.*/)?\\.\\.(/|$))\\S+$" }
        },
        env: {
          type: "object",
          propertyNames: { pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
          additionalProperties: { type: "string", pattern: "^[^\\r\\n]*$" }
        }
      }
    },
    service: {
      type: "object",
      additionalProperties: false,
      properties: {
        memory: { type: "string", pattern: "^[0-9]+(Mi|Gi)$" },
        cpu: { type: "number", exclusiveMinimum: 0, maximum: 8 },
        minInstances: { type: "integer", minimum: 0 },
        maxInstances: { type: "integer", minimum: 1 },
        concurrency: { type: "integer", minimum: 1, maximum: 1000 },
        port: { type: "integer", minimum: 1, maximum: 65535 }
      }
    },
    deploy: {
      type: "object",
      additionalProperties: false,
      properties: {
        pollIntervalMs: { type: "integer", minimum: 1 },
        buildTimeoutMs: { type: "integer", minimum: 1 },
        deployTimeoutMs: { type: "integer", minimum: 1 }
      }
    }
  }
} as const
