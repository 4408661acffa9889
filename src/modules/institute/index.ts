export { instituteRoutes } from "./routes/institute.routes.js";
