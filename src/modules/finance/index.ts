export { financeRoutes } from "./routes/finance.routes.js";
