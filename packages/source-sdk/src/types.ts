/**
 * One message as delivered by a channel transport.
 * `text` is left untyped: transports hand over whatever the platform returned.
 */
export interface RawMessage {
  id: number;
  text: unknown;
  timestamp: Date;
}

export interface SourceManifest {
  id: string;
  name: string;
  version: string;
  schedule: string;
}

export interface FetchOptions {
  /** Upper bound on the number of messages returned. */
  limit?: number;
}

export interface FetchResult {
  messages: RawMessage[];
}

export interface MessageSource {
  manifest: SourceManifest;
  fetch(options?: FetchOptions): Promise<FetchResult>;
}
