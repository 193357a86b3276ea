import { getBySet } from '../jsutils/getBySet';
import { isSameSet } from '../jsutils/isSameSet';

import type {
  DeferUsage,
  FieldDetails,
  FieldGroup,
  GroupedFieldSet,
} from './collectFields';

export type DeferUsageSet = ReadonlySet<DeferUsage>;

export interface NewGroupedFieldSetDetails {
  groupedFieldSet: GroupedFieldSet;
  shouldInitiateDefer: boolean;
}

export interface FieldPlan {
  groupedFieldSet: GroupedFieldSet;
  newGroupedFieldSets: Map<DeferUsageSet, NewGroupedFieldSetDetails>;
}

/**
 * Splits the collected fields of one object boundary into the fields to be
 * executed now and the fields of each newly deferred grouped field set.
 *
 * A response key selected at least once outside of any deferred fragment is
 * always executed now. Otherwise the key is keyed by the set of defer usages
 * under which it was selected, dropping any usage with an ancestor in the
 * same set. Keys whose set matches `parentDeferUsages` (compared by
 * membership) belong to the current grouped field set.
 */
export function buildFieldPlan(
  fields: ReadonlyMap<string, ReadonlyArray<FieldDetails>>,
  parentDeferUsages: DeferUsageSet = new Set<DeferUsage>(),
): FieldPlan {
  const groupedFieldSet = new Map<string, FieldGroup>();

  const newGroupedFieldSets = new Map<
    DeferUsageSet,
    { groupedFieldSet: Map<string, FieldGroup>; shouldInitiateDefer: boolean }
  >();

  for (const [responseKey, fieldGroup] of fields) {
    const deferUsageSet = getDeferUsageSet(fieldGroup);

    if (isSameSet(deferUsageSet, parentDeferUsages)) {
      groupedFieldSet.set(responseKey, fieldGroup);
      continue;
    }

    let newGroupedFieldSetDetails = getBySet(
      newGroupedFieldSets,
      deferUsageSet,
    );
    if (newGroupedFieldSetDetails === undefined) {
      newGroupedFieldSetDetails = {
        groupedFieldSet: new Map(),
        shouldInitiateDefer: Array.from(deferUsageSet).some(
          (deferUsage) => !parentDeferUsages.has(deferUsage),
        ),
      };
      newGroupedFieldSets.set(deferUsageSet, newGroupedFieldSetDetails);
    }
    newGroupedFieldSetDetails.groupedFieldSet.set(responseKey, fieldGroup);
  }

  return {
    groupedFieldSet,
    newGroupedFieldSets,
  };
}

function getDeferUsageSet(
  fieldGroup: ReadonlyArray<FieldDetails>,
): DeferUsageSet {
  const deferUsageSet = new Set<DeferUsage>();
  for (const fieldDetails of fieldGroup) {
    const deferUsage = fieldDetails.deferUsage;
    if (deferUsage === undefined) {
      // being in the non-deferred selection always wins
      return new Set();
    }
    deferUsageSet.add(deferUsage);
  }

  for (const deferUsage of deferUsageSet) {
    if (hasAncestorInSet(deferUsage, deferUsageSet)) {
      deferUsageSet.delete(deferUsage);
    }
  }
  return deferUsageSet;
}

function hasAncestorInSet(
  deferUsage: DeferUsage,
  deferUsageSet: DeferUsageSet,
): boolean {
  let ancestor = deferUsage.parentDeferUsage;
  while (ancestor !== undefined) {
    if (deferUsageSet.has(ancestor)) {
      return true;
    }
    ancestor = ancestor.parentDeferUsage;
  }
  return false;
}
