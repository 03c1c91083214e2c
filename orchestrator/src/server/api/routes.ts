/**
 * API routes for the bridge.
 */

import { Router } from "express";
import { analyticsRouter, statsRouter, tagsRouter } from "./routes/analytics";
import { exportRouter } from "./routes/export";
import { greenhouseRouter } from "./routes/greenhouse";
import { healthRouter } from "./routes/health";
import { importRouter } from "./routes/import";
import { migrationRouter } from "./routes/migration";
import { prospectsRouter } from "./routes/prospects";
import { settingsRouter } from "./routes/settings";
import { usersMapRouter } from "./routes/users-map";
import { webhookRouter } from "./routes/webhook";

export const apiRouter = Router();

apiRouter.use("/health", healthRouter);
apiRouter.use("/greenhouse", greenhouseRouter);
apiRouter.use("/export", exportRouter);
apiRouter.use("/import", importRouter);
apiRouter.use("/migration", migrationRouter);
apiRouter.use("/users-map", usersMapRouter);
apiRouter.use("/stats", statsRouter);
apiRouter.use("/analytics", analyticsRouter);
apiRouter.use("/tags", tagsRouter);
apiRouter.use("/prospects", prospectsRouter);
apiRouter.use("/settings", settingsRouter);
apiRouter.use("/webhook", webhookRouter);
