export const PERMISSIONS = [
  "manage_users",
  "manage_staff",
  "manage_orders",
  "manage_checkouts",
  "manage_rooms",
  "manage_apps",
  "manage_pages",
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export type RequesterKind = Requester["kind"];

/**
 * Kinds that can hold permissions. Anonymous requesters never do.
 */
export type PrivilegedRequesterKind = Exclude<RequesterKind, "anonymous">;

export interface AnonymousRequester {
  readonly kind: "anonymous";
}

export interface UserRequester {
  readonly kind: "customer" | "staff";
  readonly userId: string;
  readonly permissions: ReadonlyArray<Permission>;
}

export interface AppRequester {
  readonly kind: "app";
  readonly appId: string;
  readonly permissions: ReadonlyArray<Permission>;
}

/**
 * The caller of a metadata operation together with its resolved permission set.
 */
export type Requester = AnonymousRequester | UserRequester | AppRequester;

export const ANONYMOUS_REQUESTER: AnonymousRequester = { kind: "anonymous" };

export const describeRequester = (requester: Requester): { readonly type: string; readonly id: string } => {
  switch (requester.kind) {
    case "anonymous":
      return { type: "anonymous", id: "anonymous" };
    case "app":
      return { type: "app", id: requester.appId };
    default:
      return { type: requester.kind, id: requester.userId };
  }
};
