import type { FilingObservation, FilingRecord } from "../../core/entities/filing";
import type { ComparisonField } from "../../shared/config/env";
import { compareIsoDates } from "../../shared/time/dateUtils";

export type IdentityDecision =
  | { kind: "new"; observation: FilingObservation; version: number }
  | { kind: "duplicate"; observation: FilingObservation; active: FilingRecord }
  | {
      kind: "amendment";
      observation: FilingObservation;
      prior: FilingRecord;
      version: number;
      changedFields: ComparisonField[];
    }
  | {
      kind: "retry";
      observation: FilingObservation;
      failed: FilingRecord;
      /** Still-active record the failed version was meant to replace. */
      supersedes: FilingRecord | null;
    }
  | {
      kind: "stale";
      observation: FilingObservation;
      active: FilingRecord;
      changedFields: ComparisonField[];
    };

export type IdentityDecisionKind = IdentityDecision["kind"];

/** Fields that mark an amendment whatever the filing date. */
const dateIndependentTriggers: readonly ComparisonField[] = [
  "amendmentMarker",
  "contentReference",
];

const collapse = (value: string): string => value.trim().replace(/\s+/g, " ");

const classification = (value: string): string => collapse(value).toLowerCase();

const contentReference = (value: string | null | undefined): string | null => {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  return trimmed ? trimmed : null;
};

/**
 * Collapses every observation of one document identity within a batch into a
 * single one: the latest filing date wins and a later position breaks ties.
 * Identities keep the order of their first appearance.
 */
export const mergeObservations = (
  observations: readonly FilingObservation[],
): FilingObservation[] => {
  const merged = new Map<string, FilingObservation>();

  for (const observation of observations) {
    const current = merged.get(observation.documentIdentity);
    if (
      !current ||
      compareIsoDates(observation.filedOn, current.filedOn) >= 0
    ) {
      merged.set(observation.documentIdentity, observation);
    }
  }

  return Array.from(merged.values());
};

/**
 * Decides what a fresh observation means against the stored versions of its
 * document identity. Only the configured comparison fields can make two
 * observations differ; their values are normalised first.
 */
export class IdentityResolver {
  constructor(private readonly comparisonFields: readonly ComparisonField[]) {
    if (comparisonFields.length === 0) {
      throw new Error("At least one comparison field is required.");
    }
  }

  /**
   * @param history every stored record for the observation's identity, in
   * ascending version order
   */
  classify(
    observation: FilingObservation,
    history: readonly FilingRecord[],
  ): IdentityDecision {
    const latest = history.at(-1);
    if (!latest) {
      return { kind: "new", observation, version: 1 };
    }

    if (latest.status === "failed") {
      const target = latest.supersedes
        ? history.find(
            (record) =>
              record.id === latest.supersedes && record.status === "active",
          )
        : undefined;

      return {
        kind: "retry",
        observation,
        failed: latest,
        supersedes: target ?? null,
      };
    }

    const active = history.find((record) => record.status === "active");
    if (!active) {
      // Every stored version is superseded; start a fresh version above them.
      return { kind: "new", observation, version: latest.version + 1 };
    }

    const changedFields = this.changedFields(observation, active);
    if (changedFields.length === 0) {
      return { kind: "duplicate", observation, active };
    }

    const explicitAmendment = changedFields.some((field) =>
      dateIndependentTriggers.includes(field),
    );
    if (
      !explicitAmendment &&
      compareIsoDates(observation.filedOn, active.filedOn) < 0
    ) {
      return { kind: "stale", observation, active, changedFields };
    }

    return {
      kind: "amendment",
      observation,
      prior: active,
      version: latest.version + 1,
      changedFields,
    };
  }

  changedFields(
    observation: FilingObservation,
    record: FilingRecord,
  ): ComparisonField[] {
    return this.comparisonFields.filter(
      (field) => !this.fieldMatches(field, observation, record),
    );
  }

  private fieldMatches(
    field: ComparisonField,
    observation: FilingObservation,
    record: FilingRecord,
  ): boolean {
    switch (field) {
      case "filedOn":
        return observation.filedOn === record.filedOn;
      case "filingType":
        return (
          classification(observation.filingType) ===
          classification(record.filingType)
        );
      case "documentType":
        return (
          classification(observation.documentType) ===
          classification(record.documentType)
        );
      case "contentReference": {
        const observed = contentReference(observation.sourceUrl);
        const stored = contentReference(record.sourceUrl);
        // A row without a reference says nothing about the content.
        return observed === null || stored === null || observed === stored;
      }
      case "amendmentMarker":
        // The marker only ever signals a change; its absence retracts nothing.
        return !observation.amendmentMarker || record.amendmentMarker;
    }
  }
}
