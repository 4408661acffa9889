export { applicationRoutes } from "./routes/applications.routes.js";
