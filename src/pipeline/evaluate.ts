// pattern: Functional Core
import type { AlertPolicy } from "../config";
import { canonicalizeFeed } from "./canonicalizer";
import { fingerprintDays, fingerprintText } from "./fingerprint";
import { detectRevision } from "./detector";
import { assessRelevance } from "./relevance";
import { evaluateGate } from "./gate";
import type {
  CanonicalFeed,
  NotificationDecision,
  RawFeed,
  RelevantRevision,
  RevisionEffect,
  RevisionState,
} from "./types";

export type EvaluationOutcome =
  | { readonly kind: "first_sync" }
  | { readonly kind: "unchanged"; readonly autoCleared: boolean }
  | { readonly kind: "not_relevant" }
  | {
      readonly kind: "gated";
      readonly relevance: RelevantRevision;
      readonly decision: NotificationDecision;
    };

export type EvaluationInput = {
  readonly state: RevisionState;
  readonly feed: RawFeed;
  readonly policy: AlertPolicy;
  readonly now: Date;
  readonly localHour: number;
};

export type Evaluation = {
  readonly state: RevisionState;
  readonly effects: ReadonlyArray<RevisionEffect>;
  readonly canonical: CanonicalFeed;
  readonly fingerprint: string;
  readonly outcome: EvaluationOutcome;
};

/**
 * One pass of canonicalize → fingerprint → detect → relevance → gate over an
 * already-loaded state. Pure: the caller persists `state` and then performs
 * `effects` in order.
 */
export function evaluateFeed(input: EvaluationInput): Evaluation {
  const { feed, policy, now, localHour } = input;

  const canonical = canonicalizeFeed(feed.body, now);
  const fingerprint = fingerprintText(canonical.text);
  const dayFingerprints =
    canonical.mode === "records" ? fingerprintDays(canonical.records) : null;

  const detection = detectRevision({
    state: input.state,
    fingerprint,
    dayFingerprints,
    now,
  });

  const base = { canonical, fingerprint };

  if (detection.outcome.kind !== "changed") {
    return {
      ...base,
      state: detection.state,
      effects: detection.effects,
      outcome: detection.outcome,
    };
  }

  const relevance = assessRelevance({
    body: feed.body,
    currentDays: dayFingerprints,
    previousDays: detection.outcome.previousDays,
    windowDays: policy.windowDays,
    now,
  });

  if (!relevance.relevant) {
    return {
      ...base,
      state: detection.state,
      effects: detection.effects,
      outcome: { kind: "not_relevant" },
    };
  }

  const gate = evaluateGate({
    state: detection.state,
    fingerprint,
    policy,
    now,
    localHour,
  });

  const effects: Array<RevisionEffect> = [...detection.effects];
  if (gate.decision.deliver) {
    effects.push({
      type: "deliver",
      fingerprint,
      summary: relevance.summary,
      reason: gate.decision.reason,
    });
  }

  return {
    ...base,
    state: gate.state,
    effects,
    outcome: { kind: "gated", relevance, decision: gate.decision },
  };
}
