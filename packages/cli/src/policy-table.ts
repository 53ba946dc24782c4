import { RESOURCE_CLASSES } from "@metaguard/contracts";
import type { MetadataPolicyRule, PolicyTable } from "@metaguard/policy";

/**
 * Lists the table's rules in resource class order, ready for printing.
 */
export const describePolicyTable = (table: PolicyTable): ReadonlyArray<MetadataPolicyRule> =>
  RESOURCE_CLASSES.flatMap((resourceClass) => {
    const rule = table.get(resourceClass);
    // rules share requester kind arrays; copies keep YAML output free of aliases
    return rule ? [{ ...rule, requesterKinds: [...rule.requesterKinds] }] : [];
  });
