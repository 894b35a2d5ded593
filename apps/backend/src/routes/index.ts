import { Router } from "express";
import { driveRoutes } from "./driveRoutes";

const router = Router();

router.use("/drive", driveRoutes);

export { router as apiRouter };
