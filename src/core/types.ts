/**
 * Domain types shared across the core modules.
 */

/**
 * A license as listed by the registry, used to populate the selection prompt.
 */
export interface LicenseSummary {
  readonly key: string;
  readonly displayName: string;
  readonly spdxId: string;
}

/**
 * A single license template fetched by key.
 */
export interface LicenseText {
  readonly displayName: string;
  /** Raw template with placeholder tokens */
  readonly body: string;
}

/**
 * Values a run needs before it can render and write the license.
 */
export interface RunParameters {
  licenseKey: string;
  authorName: string;
  copyrightYear: string;
}
