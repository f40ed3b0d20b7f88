/**
 * Text accepted wherever the handler hands bytes back.
 * Header strings encode as latin1, body strings as utf8.
 */
export type BytesLike = Uint8Array | string;

/**
 * Header name/value pair as raw bytes. Names are lower-cased on the way in.
 */
export type HeaderPair = readonly [Uint8Array, Uint8Array];

/**
 * Blocking reader over the request body supplied by the synchronous caller.
 */
export interface SyncBodyReader {
  /**
   * Returns up to `size` bytes; fewer (or none) once the source is exhausted.
   */
  read(size: number): Uint8Array;
}

/**
 * One inbound request as the synchronous caller describes it.
 */
export interface SyncRequest {
  method: string;
  /**
   * Path below the mount point. Defaults to `/`.
   */
  path?: string;
  /**
   * Mount point the app is served under. Defaults to empty.
   */
  rootPath?: string;
  /**
   * Raw query string without the leading `?`.
   */
  queryString?: string;
  /**
   * Transport headers in arrival order. Names may use any case and `_` in place of `-`.
   */
  headers: ReadonlyArray<readonly [string, string]>;
  /**
   * Content type when the transport keeps it apart from the other headers.
   */
  contentType?: string;
  /**
   * Declared body length, as received.
   */
  contentLength?: string;
  body: SyncBodyReader;
  serverName: string;
  serverPort?: string;
  remoteAddr?: string;
  remotePort?: string;
  /**
   * `http` or `https`. Defaults to `http`.
   */
  scheme?: string;
  /**
   * Request protocol such as `HTTP/1.1`.
   */
  protocol?: string;
}

/**
 * Begins the synchronous response: status line such as `200 OK`, then header pairs in order.
 */
export type StartResponse = (status: string, headers: Array<[string, string]>) => void;

/**
 * The blocking request entry point. Called once per request; the returned body is pulled lazily.
 */
export type SyncApp = (request: SyncRequest, startResponse: StartResponse) => Iterable<Uint8Array>;

/**
 * Immutable per-request metadata handed to the async handler.
 */
export interface HttpScope {
  readonly type: 'http';
  readonly version: {
    readonly version: string;
    readonly specVersion: string;
  };
  readonly httpVersion: string;
  readonly method: string;
  readonly scheme: string;
  readonly path: string;
  readonly rawPath: Uint8Array;
  readonly queryString: Uint8Array;
  readonly rootPath: string;
  readonly headers: readonly HeaderPair[];
  readonly server: readonly [string, number];
  readonly client: readonly [string, number];
  readonly extensions: Readonly<Record<string, unknown>>;
}

export interface RequestMessage {
  type: 'http.request';
  body: Uint8Array;
  more: false;
}

/**
 * Delivered once the response has completed or the caller stopped reading it.
 */
export interface DisconnectMessage {
  type: 'http.disconnect';
}

export type InboundMessage = RequestMessage | DisconnectMessage;

export interface ResponseStartMessage {
  type: 'http.response.start';
  status: number;
  headers?: ReadonlyArray<readonly [BytesLike, BytesLike]>;
}

export interface ResponseBodyMessage {
  type: 'http.response.body';
  body?: BytesLike;
  /**
   * `true` when further body messages follow.
   */
  more?: boolean;
}

export type OutboundMessage = ResponseStartMessage | ResponseBodyMessage;

export type Receive = () => Promise<InboundMessage>;

export type Send = (message: OutboundMessage) => Promise<void>;

/**
 * Message-passing request handler. It is loaded by module path inside a worker thread.
 */
export type AsyncHandler = (scope: HttpScope, receive: Receive, send: Send) => Promise<void>;
