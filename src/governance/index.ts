export { Governance } from "./governance.js";
export { GOVERNANCE_PRECISION, type GovernanceParams, governanceSchema } from "./schema.js";
export { loadGovernanceFile } from "./loader.js";
