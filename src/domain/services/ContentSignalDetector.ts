import LinkifyIt from "linkify-it";
import { z } from "zod";
import riskLexicon from "../lexicon/risk-signals.json";
import { normalizeText, PhraseMatcher } from "./textMatching";

export const CONTENT_SIGNALS = [
  "externalContact",
  "offPlatformPayment",
  "suspiciousLink",
  "urgency"
] as const;

export type ContentSignalName = (typeof CONTENT_SIGNALS)[number];

export const PHRASE_GROUPS = [
  "externalContact",
  "paymentRail",
  "advancePayment",
  "paymentCredentials",
  "urgency"
] as const;

export type PhraseGroupName = (typeof PHRASE_GROUPS)[number];

/** Signals that on their own mark a message as a fraud attempt. */
export const FRAUD_CLASS_SIGNALS: readonly ContentSignalName[] = [
  "externalContact",
  "offPlatformPayment",
  "suspiciousLink"
];

const lexiconSchema = z.object({
  phraseGroups: z.array(
    z.object({
      group: z.enum(PHRASE_GROUPS),
      signal: z.enum(["externalContact", "offPlatformPayment", "urgency"]),
      phrases: z.array(z.string().min(1)).min(1)
    })
  ),
  shortenerHosts: z.array(z.string().min(1)),
  defaultAllowedHosts: z.array(z.string().min(1))
});

const lexicon = lexiconSchema.parse(riskLexicon);

// Spanish mobile/landline numbers, optionally prefixed with +34.
const PHONE_NUMBER = /(?<!\d)(?:\+?34[\s.-]?)?[6789]\d{2}[\s.-]?\d{3}[\s.-]?\d{3}(?!\d)/;

export interface ContentSignals {
  signals: ContentSignalName[];
  groups: PhraseGroupName[];
  phrases: string[];
  links: string[];
}

export interface ContentSignalDetectorOptions {
  /** Hosts that links may point to without being flagged, subdomains included. */
  allowedLinkHosts?: readonly string[];
}

export class ContentSignalDetector {
  private readonly groups: Array<{
    group: PhraseGroupName;
    signal: ContentSignalName;
    matcher: PhraseMatcher;
  }>;
  private readonly shortenerHosts: Set<string>;
  private readonly allowedHosts: string[];
  private readonly linkify = new LinkifyIt();

  constructor(options: ContentSignalDetectorOptions = {}) {
    this.groups = lexicon.phraseGroups.map((g) => ({
      group: g.group,
      signal: g.signal,
      matcher: new PhraseMatcher(g.phrases)
    }));
    this.shortenerHosts = new Set(lexicon.shortenerHosts);
    this.allowedHosts = [...(options.allowedLinkHosts ?? lexicon.defaultAllowedHosts)];
  }

  detect(text: string): ContentSignals {
    const normalized = normalizeText(text);
    const fired = new Set<ContentSignalName>();
    const groups: PhraseGroupName[] = [];
    const phrases: string[] = [];

    for (const g of this.groups) {
      const found = g.matcher.findAll(normalized);
      if (found.length > 0) {
        fired.add(g.signal);
        groups.push(g.group);
        phrases.push(...found);
      }
    }

    if (PHONE_NUMBER.test(normalized)) {
      fired.add("externalContact");
      if (!groups.includes("externalContact")) groups.push("externalContact");
    }

    const links: string[] = [];
    for (const match of this.linkify.match(normalized) ?? []) {
      if (match.schema === "mailto:") {
        fired.add("externalContact");
        if (!groups.includes("externalContact")) groups.push("externalContact");
        continue;
      }
      links.push(match.raw);
      if (this.isSuspiciousHost(hostOf(match.url))) fired.add("suspiciousLink");
    }

    return {
      signals: CONTENT_SIGNALS.filter((s) => fired.has(s)),
      groups,
      phrases,
      links
    };
  }

  hasFraudSignal(signals: ContentSignals): boolean {
    return signals.signals.some((s) => FRAUD_CLASS_SIGNALS.includes(s));
  }

  private isSuspiciousHost(host: string | null): boolean {
    if (!host) return true;
    if (this.shortenerHosts.has(host)) return true;
    return !this.allowedHosts.some((allowed) => host === allowed || host.endsWith(`.${allowed}`));
  }
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./, "");
  } catch {
    return null;
  }
}
