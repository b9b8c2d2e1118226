/**
 * Browser Session capability
 *
 * Everything the solver needs from a browser, and nothing about how the
 * browser finds things. Shadow-root traversal, frame lookup and text
 * matching live behind this interface; the solver only sequences calls.
 *
 * `TFrame` and `TControl` are opaque handles owned by the implementation.
 */

export interface BrowserSessionOptions {
  userAgent: string;
  proxy?: string;
  executablePath?: string;
  userDataPath?: string;
  headless: boolean;
  /** Launch flags, hardening arguments included */
  args: readonly string[];
  /** Directory for screenshots, when enabled */
  screenshotDir?: string;
  /** Directory for recordings, when enabled */
  recordingDir?: string;
}

/**
 * Matches the visible text of a candidate control
 */
export type ControlPredicate = (text: string) => boolean;

export interface BrowserSession<TFrame = unknown, TControl = unknown> {
  /**
   * Load url, rejecting when the page has not loaded within timeoutMs
   */
  navigate(url: string, timeoutMs: number): Promise<void>;

  /**
   * Let asynchronous page content finish before probing
   */
  settle(ms: number): Promise<void>;

  /**
   * First iframe, searched through nested shadow roots, whose src starts
   * with originPrefix
   */
  findChallengeFrame(originPrefix: string): Promise<TFrame | null>;

  /**
   * First element in document order inside the frame's shadow root whose
   * own text satisfies predicate
   */
  findControl(frame: TFrame, predicate: ControlPredicate): Promise<TControl | null>;

  click(control: TControl): Promise<void>;

  /**
   * Resolves true once control is gone from the DOM, false if it is still
   * attached after timeoutMs
   */
  waitRemoved(control: TControl, timeoutMs: number): Promise<boolean>;

  /**
   * Cookies for the current page. Typed unknown: the result is validated
   * by the caller.
   */
  readCookies(): Promise<unknown>;

  /**
   * Save a screenshot; returns the written path
   */
  screenshot?(label: string): Promise<string>;

  startRecording?(): Promise<void>;

  /**
   * Returns the path of the saved recording, if any
   */
  stopRecording?(): Promise<string | null>;

  close(): Promise<void>;
}

/**
 * Opens a fresh, exclusively owned session
 */
export type BrowserSessionFactory = (options: BrowserSessionOptions) => Promise<BrowserSession>;
