/**
 * Fatal loader errors. Both abort the run for the repository they concern.
 */

/**
 * The node-class mapping could not be located in a repository tree.
 */
export class DiscoveryError extends Error {
  readonly root: string;

  constructor(root: string, message: string) {
    super(message);
    this.name = 'DiscoveryError';
    this.root = root;
  }
}

/**
 * The top-level node-class mapping was found but cannot be read.
 */
export class MappingParseError extends DiscoveryError {
  readonly file: string;

  constructor(root: string, file: string, message: string) {
    super(root, `${file}: ${message}`);
    this.name = 'MappingParseError';
    this.file = file;
  }
}
