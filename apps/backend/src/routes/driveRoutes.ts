import { Router } from "express";
import { driveController } from "../controllers/driveController";

const router = Router();

router.get("/catalog", driveController.getCatalog);
router.get("/tuning", driveController.getTuning);
router.post("/sessions", driveController.createSession);
router.get("/sessions/:id", driveController.getSession);
router.delete("/sessions/:id", driveController.deleteSession);
router.post("/sessions/:id/step", driveController.step);
router.post("/sessions/:id/selection", driveController.select);
router.post("/sessions/:id/commands", driveController.command);
router.get("/sessions/:id/results", driveController.getResults);

export { router as driveRoutes };
