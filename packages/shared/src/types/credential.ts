export interface Credential {
  host: string;
  username: string;
  secret: string;
}

export interface CredentialFileRef {
  host: string;
  /** Final location, as referenced from the mount table */
  path: string;
  /** Where the file can be read right now when that differs from `path` (dry run) */
  stagedPath?: string;
}
