export interface TransactionalResource {
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export function isTransactionalResource(value: unknown): value is TransactionalResource {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return "begin" in value && "commit" in value && "rollback" in value
    && typeof value.begin === "function"
    && typeof value.commit === "function"
    && typeof value.rollback === "function";
}
