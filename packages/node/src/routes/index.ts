export { createHealthRoutes } from "./health.js";
export { createWrapperRoutes } from "./wrapper.js";
export { createOperationRoutes } from "./operations.js";
export { createAdminRoutes } from "./admin.js";
export { createSandboxRoutes } from "./sandbox.js";
export { createEventRoutes } from "./events.js";
