export { departmentRoutes } from "./routes/department.routes.js";
