export { disbursementRoutes } from "./routes/disbursements.routes.js";
