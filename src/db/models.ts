export { ApplicationModel, type ApplicationDoc } from "./models/application.model.js";
export { DecisionLogModel, type DecisionLogDoc } from "./models/decision-log.model.js";
export { DisbursementModel, type DisbursementDoc } from "./models/disbursement.model.js";
export { IdempotencyKeyModel, type IdempotencyKeyDoc } from "./models/idempotency-key.model.js";
