// api/src/assessment.ts
import { Router, Request, Response } from "express";
import { asyncHandler, AppError } from "./middleware/errorHandler.js";
import type { RandomSource } from "./random.js";
import { buildReport, renderReportPdf } from "./report.js";
import type { SessionStore } from "./sessionStore.js";
import type { TrainedModel } from "./trainer.js";
import type { SessionState } from "./types.js";
import { parseWizardAction } from "./validation.js";
import { renderView } from "./views.js";
import { applyAction } from "./wizard.js";

export type AssessmentDeps = {
  model: TrainedModel;
  sessions: SessionStore;
  random: RandomSource;
  now?: () => Date;
};

export function createAssessmentRouter(deps: AssessmentDeps): Router {
  const { model, sessions } = deps;
  const router = Router();

  const present = (session: SessionState) => ({
    sessionId: session.id,
    view: renderView(session, model),
  });

  // model: accuracy and feature importance
  router.get("/model", (_req: Request, res: Response) => {
    res.json({
      accuracy: model.accuracy,
      featureImportance: model.importance,
      medians: model.medians,
      trees: model.treeCount,
      trainSize: model.split.trainIndices.length,
      testSize: model.split.testIndices.length,
    });
  });

  router.post("/sessions", (_req: Request, res: Response) => {
    const session = sessions.create(deps.now?.());
    res.status(201).json(present(session));
  });

  router.get("/sessions/:id", (req: Request, res: Response) => {
    res.json(present(sessions.get(req.params.id)));
  });

  router.post("/sessions/:id/actions", (req: Request, res: Response) => {
    const session = sessions.get(req.params.id);

    const parsed = parseWizardAction(req.body);
    if (!parsed.success) {
      throw new AppError("Invalid action", 400, { code: "INVALID_ACTION", details: parsed.error });
    }

    const result = applyAction(session, parsed.data, deps);
    if (!result.accepted) {
      throw new AppError(result.reason, 409, {
        code: "TRANSITION_REJECTED",
        details: { step: session.step, action: parsed.data.type },
      });
    }

    sessions.save(result.state);
    res.json(present(result.state));
  });

  router.delete("/sessions/:id", (req: Request, res: Response) => {
    if (!sessions.delete(req.params.id)) {
      throw new AppError("Session not found", 404, { code: "SESSION_NOT_FOUND" });
    }
    res.status(204).end();
  });

  // PDF: the session is not changed, so a failed export can be retried
  router.get(
    "/sessions/:id/report.pdf",
    asyncHandler(async (req: Request, res: Response) => {
      const report = buildReport(sessions.get(req.params.id));
      const pdf = await renderReportPdf(report);
      res
        .status(200)
        .type("application/pdf")
        .attachment(report.fileName)
        .send(pdf);
    })
  );

  return router;
}
