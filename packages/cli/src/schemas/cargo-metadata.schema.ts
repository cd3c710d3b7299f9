/** The subset of `cargo metadata --no-deps --format-version 1` Runway reads. */
export interface CargoTarget {
  readonly name: string
  readonly kind: readonly string[]
}

export interface CargoPackage {
  readonly name: string
  readonly version: string
  readonly manifest_path: string
  readonly default_run?: string | null
  readonly targets: readonly CargoTarget[]
}

export interface CargoMetadata {
  readonly packages: readonly CargoPackage[]
}

export const cargoMetadataSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  required: ["packages"],
  properties: {
    packages: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "version", "manifest_path", "targets"],
        properties: {
          name: { type: "string" },
          version: { type: "string" },
          manifest_path: { type: "string" },
          default_run: { type: ["string", "null"] },
          targets: {
            type: "array",
            items: {
              type: "object",
              required: ["name", "kind"],
              properties: {
                name: { type: "string" },
                kind: { type: "array", items: { type: "string" } }
              }
            }
          }
        }
      }
    }
  }
} as const
