/**
 * Types for turning transport policies into a curl command line.
 */

/** Optional transport policies; each is independent of the others */
export interface TransportConfig {
  /** Basic-auth credential, `user` or `user:password` */
  auth?: string;

  /** CA certificate file used to verify the peer (`--cacert`) */
  caCertPath?: string;

  /** Directory of CA certificates used to verify the peer (`--capath`) */
  caDirPath?: string;

  /** Client certificate presented to the server (`--cert`) */
  clientCertPath?: string;

  /** Continue from the current size of an existing partial destination */
  resume?: boolean;

  /** Skip TLS verification */
  insecureTLS?: boolean;

  /** Raw header lines, passed through in order, duplicates included */
  headers?: readonly string[];

  /** Running from a packaged install that ships its own CA bundle */
  packaged?: boolean;

  /** Embedded directory of the packaged install; the CA bundle lives here */
  installerEmbeddedDir?: string;
}

/** Result of {@link buildTransportOptions} */
export interface TransportOptions {
  /** curl arguments, excluding source, destination and operation flags */
  args: string[];

  /** Environment variables to overlay onto the inherited environment */
  env: Record<string, string>;
}

/** A transfer ready to hand to the coordinator. Frozen on construction. */
export interface TransferRequest {
  /** Source URL with any user-info removed */
  readonly source: string;

  /** Destination file path */
  readonly destination: string;

  /** Transport policies, with `auth` filled from the URL when it was unset */
  readonly config: Readonly<TransportConfig>;
}
