export { ConflictError } from "./conflict-error.js";
export { ExternalError } from "./external-error.js";
export { InternalError } from "./internal-error.js";
export { NotFoundError } from "./not-found-error.js";
export { PermissionError } from "./permission-error.js";
export { RateLimitError } from "./rate-limit-error.js";
export { TimeoutError } from "./timeout-error.js";
export { ValidationError } from "./validation-error.js";
