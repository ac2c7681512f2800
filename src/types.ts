/**
 * Shared types for the node-compat CLI
 */

/** Where the loader reads node declarations from */
export type RegistrySourceOption = 'auto' | 'python' | 'manifest';

export interface CheckOptions {
  source?: RegistrySourceOption;
  manifest?: string;
  failOnRemoved?: boolean;
  allowAppended?: boolean;
  json?: boolean;
}

export interface InspectOptions {
  source?: RegistrySourceOption;
  manifest?: string;
  json?: boolean;
}
