/**
 * Playwright-backed BrowserSession
 *
 * Playwright is loaded lazily so the rest of the library works (and tests
 * run) without browser binaries. Install them with
 * `npx playwright install chromium` before solving for real.
 *
 * Controls are found and tracked over CDP (see cdp-dom.ts) so closed
 * shadow roots are searched and a handle always means the same element.
 */

import type { Browser, BrowserContext, Frame, Mouse, Page } from 'playwright';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  BrowserSession,
  BrowserSessionFactory,
  BrowserSessionOptions,
  ControlPredicate,
} from './browser-session.js';
import {
  locateControl,
  nodeCenter,
  waitForNodeRemoval,
  type CdpClient,
  type Point,
} from './cdp-dom.js';
import { SessionError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

type PlaywrightModule = typeof import('playwright');

let playwrightModule: PlaywrightModule | null = null;

async function loadPlaywright(): Promise<PlaywrightModule> {
  if (playwrightModule) {
    return playwrightModule;
  }
  try {
    playwrightModule = await import('playwright');
    return playwrightModule;
  } catch (error) {
    throw new SessionError(
      'Playwright is not installed. Install it with: npm install playwright && npx playwright install chromium',
      { cause: error }
    );
  }
}

interface PlaywrightProxy {
  server: string;
  username?: string;
  password?: string;
}

/**
 * Playwright takes proxy credentials separately from the server address
 */
export function toPlaywrightProxy(proxy: string | undefined): PlaywrightProxy | undefined {
  if (!proxy) {
    return undefined;
  }
  const parsed = new URL(proxy);
  const result: PlaywrightProxy = { server: `${parsed.protocol}//${parsed.host}` };
  if (parsed.username) {
    result.username = decodeURIComponent(parsed.username);
    result.password = decodeURIComponent(parsed.password);
  }
  return result;
}

function fileTimestamp(): string {
  return new Date().toISOString().replace(/[:.]/g, '-');
}

/** What the session reads from a frame */
export type ChallengeFrame = Pick<Frame, 'url' | 'frameElement'>;

export type SessionPage<F extends ChallengeFrame = Frame> = Pick<
  Page,
  'goto' | 'waitForTimeout' | 'url' | 'screenshot' | 'close' | 'video'
> & {
  frames: () => F[];
  mouse: Pick<Mouse, 'click'>;
};

export interface PlaywrightHandles<F extends ChallengeFrame = Frame> {
  /** null for a persistent context, which owns its browser */
  browser: Pick<Browser, 'close'> | null;
  context: Pick<BrowserContext, 'cookies' | 'close'>;
  page: SessionPage<F>;
  /** CDP session on the frame's own target; rejects for in-process frames */
  openFrameClient: (frame: F) => Promise<CdpClient>;
  /** CDP session on the page's own target */
  openPageClient: () => Promise<CdpClient>;
}

/** A verification control, pinned to one element by backendNodeId */
export interface ControlHandle {
  client: CdpClient;
  backendNodeId: number;
  /** Page coordinates of the client's viewport origin */
  origin: () => Promise<Point>;
}

interface FrameClient {
  client: CdpClient;
  origin: () => Promise<Point>;
}

const PAGE_ORIGIN: Point = { x: 0, y: 0 };

async function frameOrigin(frame: ChallengeFrame): Promise<Point> {
  const element = await frame.frameElement();
  try {
    const box = await element.boundingBox();
    if (!box) {
      throw new Error('Challenge frame is not rendered');
    }
    return { x: box.x, y: box.y };
  } finally {
    await element.dispose();
  }
}

export class PlaywrightSession<F extends ChallengeFrame = Frame> implements BrowserSession<F, ControlHandle> {
  private readonly frameClients = new Map<F, FrameClient>();
  private pageClient: CdpClient | null = null;

  constructor(
    private readonly handles: PlaywrightHandles<F>,
    private readonly options: BrowserSessionOptions
  ) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.handles.page.goto(url, { waitUntil: 'load', timeout: timeoutMs });
  }

  async settle(ms: number): Promise<void> {
    await this.handles.page.waitForTimeout(ms);
  }

  async findChallengeFrame(originPrefix: string): Promise<F | null> {
    // The frame tree comes from the browser, so frames attached inside
    // shadow roots (open or closed) are listed too
    return this.handles.page.frames().find((frame) => frame.url().startsWith(originPrefix)) ?? null;
  }

  async findControl(frame: F, predicate: ControlPredicate): Promise<ControlHandle | null> {
    const { client, origin } = await this.frameClient(frame);
    const backendNodeId = await locateControl(client, predicate);
    return backendNodeId === null ? null : { client, backendNodeId, origin };
  }

  async click(control: ControlHandle): Promise<void> {
    const center = await nodeCenter(control.client, control.backendNodeId);
    const origin = await control.origin();
    await this.handles.page.mouse.click(origin.x + center.x, origin.y + center.y);
  }

  async waitRemoved(control: ControlHandle, timeoutMs: number): Promise<boolean> {
    return waitForNodeRemoval(control.client, control.backendNodeId, timeoutMs, (ms) =>
      this.handles.page.waitForTimeout(ms)
    );
  }

  async readCookies(): Promise<unknown> {
    return this.handles.context.cookies(this.handles.page.url());
  }

  async screenshot(label: string): Promise<string> {
    const dir = this.options.screenshotDir;
    if (!dir) {
      throw new Error('Screenshots are not enabled for this session');
    }
    await fs.mkdir(dir, { recursive: true });
    const file = path.join(dir, `${fileTimestamp()}_${label}.png`);
    await this.handles.page.screenshot({ path: file, fullPage: true });
    return file;
  }

  /**
   * Video starts with the page when the session is opened with a
   * recordingDir; this only checks that it did.
   */
  async startRecording(): Promise<void> {
    if (!this.handles.page.video()) {
      throw new Error('Video recording needs a recordingDir when the session is opened');
    }
  }

  /**
   * Closing the page finishes the video file
   */
  async stopRecording(): Promise<string | null> {
    const video = this.handles.page.video();
    if (!video) {
      return null;
    }
    await this.handles.page.close();
    return video.path();
  }

  async close(): Promise<void> {
    try {
      await this.handles.context.close();
    } finally {
      await this.handles.browser?.close();
    }
  }

  /**
   * Out-of-process frames get their own CDP target, whose coordinates start
   * at the iframe's box. In-process frames share the page target.
   */
  private async frameClient(frame: F): Promise<FrameClient> {
    const cached = this.frameClients.get(frame);
    if (cached) {
      return cached;
    }
    let entry: FrameClient;
    try {
      const client = await this.handles.openFrameClient(frame);
      entry = { client, origin: () => frameOrigin(frame) };
    } catch (error) {
      logger.browser.debug('Challenge frame shares the page target', { error: errorMessage(error) });
      this.pageClient ??= await this.handles.openPageClient();
      entry = { client: this.pageClient, origin: async () => PAGE_ORIGIN };
    }
    this.frameClients.set(frame, entry);
    return entry;
  }
}

/**
 * Launch Chromium for one solve run. A userDataPath gives a persistent
 * profile; otherwise the browser is fresh. A recordingDir turns on video
 * for every page of the context.
 */
export const createPlaywrightSession: BrowserSessionFactory = async (options) => {
  const pw = await loadPlaywright();
  const proxy = toPlaywrightProxy(options.proxy);
  const launch = {
    headless: options.headless,
    executablePath: options.executablePath,
    args: [...options.args],
    proxy,
  };
  const contextOptions = {
    userAgent: options.userAgent,
    recordVideo: options.recordingDir ? { dir: options.recordingDir } : undefined,
  };

  logger.browser.debug('Launching Chromium', {
    headless: options.headless,
    persistent: Boolean(options.userDataPath),
    proxied: Boolean(proxy),
    recording: Boolean(options.recordingDir),
  });

  if (options.userDataPath) {
    const context = await pw.chromium.launchPersistentContext(options.userDataPath, {
      ...launch,
      ...contextOptions,
    });
    const page = context.pages()[0] ?? (await context.newPage());
    return new PlaywrightSession(
      {
        browser: null,
        context,
        page,
        openFrameClient: (frame) => context.newCDPSession(frame),
        openPageClient: () => context.newCDPSession(page),
      },
      options
    );
  }

  const browser = await pw.chromium.launch(launch);
  try {
    const context = await browser.newContext(contextOptions);
    const page = await context.newPage();
    return new PlaywrightSession(
      {
        browser,
        context,
        page,
        openFrameClient: (frame) => context.newCDPSession(frame),
        openPageClient: () => context.newCDPSession(page),
      },
      options
    );
  } catch (error) {
    logger.browser.warn('Closing browser after failed context setup', { error: errorMessage(error) });
    await browser.close();
    throw error;
  }
};
