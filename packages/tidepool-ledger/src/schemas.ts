import type { SchemaInput } from "@tidepool/store";

export const ACCOUNT_NAMESPACE = "ledger.account";
export const TRANSACTION_NAMESPACE = "ledger.tx";

export const ACCOUNT_SCHEMA: SchemaInput = {
  namespace: ACCOUNT_NAMESPACE,
  version: 1,
  fields: [
    { path: "owner", type: "string", strategy: "immutable" },
    { path: "confirmed_balance", type: "int", strategy: "pn_counter", bound: { min: 0 } },
    { path: "local_escrow", type: "int", strategy: "lww", bound: { min: 0 } },
    { path: "escrow_allocated", type: "int", strategy: "lww", bound: { min: 0 } },
    { path: "escrow_period", type: "int", strategy: "lww" },
    { path: "pending_credits", type: "int", strategy: "pn_counter" },
    { path: "transaction_history", type: "TxRef[]", strategy: "rga" },
    { path: "trust_connections", type: "TrustConnection[]", strategy: "or_set" },
    { path: "reputation_tier", type: "ReputationTier", strategy: "lww" },
  ],
};

export const TRANSACTION_SCHEMA: SchemaInput = {
  namespace: TRANSACTION_NAMESPACE,
  version: 1,
  fields: [
    { path: "id", type: "string", strategy: "immutable" },
    { path: "from", type: "string", strategy: "immutable" },
    { path: "to", type: "string", strategy: "immutable" },
    { path: "amount", type: "int", strategy: "immutable" },
    { path: "created_at", type: "timestamp", strategy: "immutable" },
    { path: "status", type: "TransactionStatus", strategy: "lww" },
    { path: "confirmed_at", type: "timestamp", strategy: "lww" },
    { path: "rejection_reason", type: "string", strategy: "lww" },
  ],
};
