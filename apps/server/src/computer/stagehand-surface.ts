import { Stagehand } from "@browserbasehq/stagehand";
import type { Logger } from "../logger.js";
import { ComputerUseError, errorMessage } from "./errors.js";
import { OperationGate, type BrowsingSurface } from "./surface.js";

/** The slice of a Stagehand page the surface drives. */
interface AutomationPage {
  goto(url: string, options?: { waitUntil?: "load" | "domcontentloaded" | "networkidle" }): Promise<unknown>;
  url(): string;
  evaluate(expression: string): Promise<unknown>;
  screenshot(): Promise<Uint8Array>;
}

export type StagehandSurfaceOptions = {
  env: "LOCAL" | "BROWSERBASE";
  headless: boolean;
  viewport: { width: number; height: number };
  browserbaseApiKey?: string;
  browserbaseProjectId?: string;
  logger: Logger;
};

export class StagehandSurface implements BrowsingSurface {
  private readonly navigation = new OperationGate("navigation");
  private readonly evaluation = new OperationGate("script evaluation");
  private closed = false;
  private hasLoaded = false;

  private constructor(
    private readonly stagehand: Stagehand,
    private readonly page: AutomationPage,
    private readonly log: Logger
  ) {}

  static async launch(options: StagehandSurfaceOptions): Promise<StagehandSurface> {
    const stagehand = new Stagehand({
      env: options.env,
      apiKey: options.browserbaseApiKey,
      projectId: options.browserbaseProjectId,
      localBrowserLaunchOptions: {
        headless: options.headless,
        viewport: options.viewport,
      },
    });
    try {
      await stagehand.init();
    } catch (err) {
      throw new ComputerUseError("SurfaceUnavailable", `Browser failed to start: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const page: AutomationPage | undefined = stagehand.context.pages()[0];
    if (!page) {
      await stagehand.close().catch((err: unknown) => options.logger.warn({ err }, "stagehand close failed"));
      throw new ComputerUseError("SurfaceUnavailable", "Browser started without a page");
    }
    options.logger.info({ env: options.env, viewport: options.viewport }, "browsing surface ready");
    return new StagehandSurface(stagehand, page, options.logger);
  }

  private assertAttached(): void {
    if (this.closed) throw new ComputerUseError("SurfaceUnavailable", "Browsing surface is closed");
  }

  async navigate(url: string): Promise<void> {
    this.assertAttached();
    await this.navigation.run(async () => {
      try {
        await this.page.goto(url, { waitUntil: "domcontentloaded" });
        this.hasLoaded = true;
      } catch (err) {
        throw new ComputerUseError("NavigationFailed", `Could not load ${url}: ${errorMessage(err)}`, { cause: err });
      }
    });
  }

  async evaluateScript(script: string): Promise<unknown> {
    this.assertAttached();
    return this.evaluation.run(async () => {
      try {
        return await this.page.evaluate(script);
      } catch (err) {
        throw new ComputerUseError("ScriptExecutionError", errorMessage(err), { cause: err });
      }
    });
  }

  async snapshot(): Promise<Uint8Array> {
    this.assertAttached();
    try {
      return await this.page.screenshot();
    } catch (err) {
      throw new ComputerUseError("CaptureFailed", errorMessage(err), { cause: err });
    }
  }

  currentURL(): string | null {
    if (this.closed || !this.hasLoaded) return null;
    const url = this.page.url();
    return url === "" ? null : url;
  }

  isAttached(): boolean {
    return !this.closed;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.stagehand.close();
    } catch (err) {
      this.log.warn({ err }, "stagehand close failed");
    }
  }
}
