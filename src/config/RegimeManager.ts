import autonomousPreset from "./regimes/autonomous.json";
import supervisedPreset from "./regimes/supervised.json";
import { RegimeConfigError } from "../domain/errors";
import { parseRegimeConfig, Regime, RegimeConfig, REGIMES } from "../domain/policy/RegimePolicy";
import { componentLogger } from "../infrastructure/logging/logger";

export type RegimeOverrides = Partial<Omit<RegimeConfig, "regime" | "riskThresholds">>;

const log = componentLogger("RegimeManager");

function isRegime(name: string): name is Regime {
  return REGIMES.some((r) => r === name);
}

/**
 * Holds the validated regime presets. A preset that fails validation stops
 * startup; overrides are merged in before validation so they cannot produce
 * an inconsistent policy either.
 */
export class RegimeManager {
  private presets: Map<Regime, RegimeConfig> = new Map();

  constructor(presets: Record<Regime, unknown> = { autonomous: autonomousPreset, supervised: supervisedPreset }) {
    for (const regime of REGIMES) {
      this.presets.set(regime, parseRegimeConfig(presets[regime]));
    }
    log.debug({ regimes: Array.from(this.presets.keys()) }, "Loaded regime presets");
  }

  get(name: string): RegimeConfig {
    if (!isRegime(name)) {
      throw new RegimeConfigError([`unknown regime "${name}", expected one of ${REGIMES.join(", ")}`]);
    }
    const preset = this.presets.get(name);
    if (!preset) {
      throw new RegimeConfigError([`regime "${name}" has no preset`]);
    }
    return preset;
  }

  getAll(): RegimeConfig[] {
    return Array.from(this.presets.values());
  }

  resolve(name: string, overrides: RegimeOverrides = {}): RegimeConfig {
    const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
    const config = parseRegimeConfig({ ...this.get(name), ...defined });
    log.info(
      {
        regime: config.regime,
        maxMessagesPerHour: config.maxMessagesPerHour,
        requireHumanConfirmation: config.requireHumanConfirmation
      },
      "Regime resolved"
    );
    return config;
  }
}
