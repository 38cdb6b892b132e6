/**
 * Risk Manager - drawdown kill switch with hysteresis
 *
 * Drawdown is measured against the persisted high-water mark of portfolio
 * value (cash + inventory exposure):
 * - >= killPct: pause all market making, latch the kill time
 * - >= reducePct: the caller halves size and market count
 *
 * Auto-resume needs all of: a latched kill (a manual pause is never lifted
 * here), drawdown below resumePct (< killPct), the cooldown elapsed, and
 * fewer than maxRecoveriesPerDay resumes so far this UTC day.
 *
 * Kill/reduce logs fire on transitions only.
 */

import {
  checkInventoryRisk,
  classifyDrawdown,
  computeDrawdownPct,
  computeExposureCheck,
  roundTo,
  type DrawdownThresholds,
  type ExposureCheck,
  type InventoryRiskCheck,
  type Ms,
  type RiskMode,
  type Usdc,
} from "@outcome-mm/core";
import type { HighWaterMarkRepository } from "@outcome-mm/repositories";
import { logger } from "@outcome-mm/utils";

export interface RiskManagerOptions extends DrawdownThresholds {
  cooldownMinutes: number;
  maxRecoveriesPerDay: number;
  clock?: () => Ms;
}

const utcDay = (ms: Ms): string => new Date(ms).toISOString().slice(0, 10);

export class RiskManager {
  private readonly hwmRepository: HighWaterMarkRepository;
  private readonly thresholds: DrawdownThresholds;
  private readonly cooldownMs: Ms;
  private readonly maxRecoveriesPerDay: number;
  private readonly clock: () => Ms;

  private peak: Usdc | null = null;
  private peakLoaded = false;
  private paused = false;
  private mode: RiskMode = "ok";
  private killTriggeredAtMs: Ms | null = null;
  private recoveriesToday = 0;
  private recoveryDay: string | null = null;

  constructor(hwmRepository: HighWaterMarkRepository, options: RiskManagerOptions) {
    this.hwmRepository = hwmRepository;
    this.thresholds = {
      reducePct: options.reducePct,
      killPct: options.killPct,
      resumePct: options.resumePct,
    };
    this.cooldownMs = options.cooldownMinutes * 60_000;
    this.maxRecoveriesPerDay = options.maxRecoveriesPerDay;
    this.clock = options.clock ?? Date.now;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /** Manual pause/unpause; a manual pause is not auto-resumed */
  set isPaused(value: boolean) {
    this.paused = value;
    if (!value) this.killTriggeredAtMs = null;
  }

  get riskMode(): RiskMode {
    return this.mode;
  }

  get highWaterMark(): Usdc | null {
    return this.peak;
  }

  get recoveriesUsedToday(): number {
    return this.recoveryDay === utcDay(this.clock()) ? this.recoveriesToday : 0;
  }

  /**
   * Update the high-water mark with `portfolioValue` and classify its drawdown
   */
  async checkIntradayDd(portfolioValue: Usdc): Promise<RiskMode> {
    const peak = await this.updatePeak(portfolioValue);
    const ddPct = computeDrawdownPct(peak, portfolioValue);
    const next = classifyDrawdown(ddPct, this.thresholds);

    if (next === "kill") {
      this.paused = true;
      if (this.killTriggeredAtMs === null) {
        this.killTriggeredAtMs = this.clock();
      }
    }

    if (next !== this.mode) {
      this.logTransition(next, ddPct, peak, portfolioValue);
    }
    this.mode = next;
    return next;
  }

  /**
   * Lift a kill-switch pause once the drawdown has recovered; true if resumed
   */
  async tryAutoResume(portfolioValue: Usdc): Promise<boolean> {
    if (!this.paused || this.killTriggeredAtMs === null) return false;

    const peak = await this.updatePeak(portfolioValue);
    const ddPct = computeDrawdownPct(peak, portfolioValue);
    if (ddPct >= this.thresholds.resumePct) return false;

    const nowMs = this.clock();
    const elapsedMs = nowMs - this.killTriggeredAtMs;
    if (elapsedMs < this.cooldownMs) return false;

    const today = utcDay(nowMs);
    if (this.recoveryDay !== today) {
      this.recoveryDay = today;
      this.recoveriesToday = 0;
    }
    if (this.recoveriesToday >= this.maxRecoveriesPerDay) return false;

    this.paused = false;
    this.killTriggeredAtMs = null;
    this.recoveriesToday++;
    this.mode = classifyDrawdown(ddPct, this.thresholds);

    logger.info("MM auto-resume", {
      ddPct: roundTo(ddPct, 1),
      resumePct: this.thresholds.resumePct,
      cooldownMinutes: Math.round(elapsedMs / 60_000),
      recovery: `${String(this.recoveriesToday)}/${String(this.maxRecoveriesPerDay)}`,
    });
    return true;
  }

  /** Operator resume: clears pause and kill latch */
  resumeTrading(): void {
    this.paused = false;
    this.killTriggeredAtMs = null;
    logger.info("Trading resumed by operator");
  }

  checkInventoryRisk(netInventory: number, maxInventory: number): InventoryRiskCheck {
    return checkInventoryRisk(netInventory, maxInventory);
  }

  checkGlobalExposure(balance: Usdc, exposure: Usdc, maxExposurePct: number): ExposureCheck {
    const check = computeExposureCheck(balance, exposure, maxExposurePct);
    if (!check.withinLimit) {
      logger.warn("Global exposure above limit", { exposurePct: check.exposurePct, maxExposurePct });
    }
    return check;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private async updatePeak(portfolioValue: Usdc): Promise<Usdc> {
    if (!this.peakLoaded) {
      const stored = await this.hwmRepository.getHighWaterMark();
      if (stored.isOk()) {
        this.peak = stored.value;
        this.peakLoaded = true;
      } else {
        logger.warn("Failed to load high-water mark", { error: stored.error.message });
      }
    }

    if (this.peak === null || portfolioValue > this.peak) {
      this.peak = portfolioValue;
      const saved = await this.hwmRepository.setHighWaterMark(portfolioValue);
      if (saved.isErr()) {
        logger.warn("Failed to persist high-water mark", { error: saved.error.message });
      }
    }
    return this.peak;
  }

  private logTransition(next: RiskMode, ddPct: number, peak: Usdc, value: Usdc): void {
    const fields = {
      ddPct: roundTo(ddPct, 1),
      peak: roundTo(peak, 2),
      current: roundTo(value, 2),
    };

    switch (next) {
      case "kill":
        logger.error("MM kill switch triggered", { ...fields, killPct: this.thresholds.killPct });
        break;
      case "reduce":
        logger.warn("MM reduce mode", { ...fields, reducePct: this.thresholds.reducePct });
        break;
      case "ok":
        logger.info("MM drawdown back to normal", fields);
        break;
    }
  }
}
