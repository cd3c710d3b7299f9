/** What Runway needs to know about the crate being deployed. */
export interface ProjectMetadata {
  readonly name: string
  readonly version: string
  /** The `[[bin]]` target built with `cargo build --release --bin`. */
  readonly binaryName: string
}
