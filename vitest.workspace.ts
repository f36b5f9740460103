import { defineWorkspace } from "vitest/config";

export default defineWorkspace(["packages/types", "packages/ledger", "packages/node"]);
