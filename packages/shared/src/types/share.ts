export interface ShareDescriptor {
  host: string;
  shareName: string;
  comment?: string;
}

export interface ShareListing {
  host: string;
  shares: ShareDescriptor[];
  ok: boolean;
  authFailed: boolean;
  /** Untouched output of the listing query, kept for diagnostics */
  rawOutput: string;
}
