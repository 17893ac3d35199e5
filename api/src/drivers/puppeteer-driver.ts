import { FastifyBaseLogger } from "fastify";
import fs from "fs";
import path from "path";
import puppeteer, { Browser } from "puppeteer-core";
import { v4 as uuidv4 } from "uuid";
import { getChromeExecutablePath } from "../utils/browser.js";
import { BrowserDriverAdapter, DriverHandle, ResumeContext, SpinContext } from "./types.js";

export interface PuppeteerDriverOptions {
  logger: FastifyBaseLogger;
  /** Each session gets a Chrome profile directory under here. */
  profilesDir: string;
  executablePath?: string;
  headless?: boolean;
  navigationTimeoutMs?: number;
}

/**
 * Drives a local Chrome through puppeteer-core, one browser per session.
 *
 * A resume token is the path of a persisted Chrome profile directory. The job
 * publishes it once cookies and storage worth keeping exist; resuming launches
 * a fresh browser on that profile and reopens the target.
 */
export class PuppeteerDriverAdapter implements BrowserDriverAdapter {
  private logger: FastifyBaseLogger;
  private browsers = new Map<string, Browser>();
  private readonly profilesDir: string;
  private readonly executablePath?: string;
  private readonly headless: boolean;
  private readonly navigationTimeoutMs: number;

  constructor(options: PuppeteerDriverOptions) {
    this.logger = options.logger.child({ component: "PuppeteerDriverAdapter" });
    this.profilesDir = options.profilesDir;
    this.executablePath = options.executablePath;
    this.headless = options.headless ?? true;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30000;
  }

  async spin(targetURL: string, context: SpinContext): Promise<DriverHandle> {
    const userDataDir = path.join(this.profilesDir, context.sessionId);
    await fs.promises.mkdir(userDataDir, { recursive: true });
    return this.open(context.sessionId, userDataDir, targetURL);
  }

  async resume(resumeToken: string, context: ResumeContext): Promise<DriverHandle> {
    if (!fs.existsSync(resumeToken)) {
      throw new Error(`Checkpoint profile not found: ${resumeToken}`);
    }
    return this.open(context.sessionId, resumeToken, context.targetURL);
  }

  async release(handle: DriverHandle): Promise<void> {
    const browser = this.browsers.get(handle.id);
    if (!browser) {
      return;
    }
    this.browsers.delete(handle.id);

    try {
      await browser.close();
      this.logger.info({ sessionId: handle.sessionId }, "[PuppeteerDriverAdapter] Browser closed");
    } catch (error) {
      this.logger.warn(
        { err: error, sessionId: handle.sessionId },
        "[PuppeteerDriverAdapter] Browser close failed, killing process",
      );
      browser.process()?.kill("SIGKILL");
    }
  }

  getOpenCount(): number {
    return this.browsers.size;
  }

  private async open(
    sessionId: string,
    userDataDir: string,
    targetURL: string,
  ): Promise<DriverHandle> {
    const shouldDisableSandbox = typeof process.getuid === "function" && process.getuid() === 0;

    const browser = await puppeteer.launch({
      executablePath: getChromeExecutablePath(this.logger, this.executablePath),
      headless: this.headless,
      userDataDir,
      defaultViewport: null,
      args: [
        "--disable-dev-shm-usage",
        "--no-first-run",
        "--no-default-browser-check",
        ...(shouldDisableSandbox ? ["--no-sandbox"] : []),
      ],
    });

    try {
      const [existing] = await browser.pages();
      const page = existing ?? (await browser.newPage());
      await page.goto(targetURL, {
        waitUntil: "domcontentloaded",
        timeout: this.navigationTimeoutMs,
      });
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        this.logger.warn(
          { err: closeError, sessionId },
          "[PuppeteerDriverAdapter] Cleanup after failed navigation failed",
        );
      });
      throw error;
    }

    const id = uuidv4();
    this.browsers.set(id, browser);
    this.logger.info({ sessionId, targetURL }, "[PuppeteerDriverAdapter] Browser ready");

    return {
      id,
      sessionId,
      launchedAt: Date.now(),
      wsEndpoint: browser.wsEndpoint(),
    };
  }
}
