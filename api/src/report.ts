// api/src/report.ts
// ============================================================================
// PDF REPORT
//
// buildReport() turns a finished session into a plain document model;
// renderReportPdf() lays that model out with pdfkit (A4, flowing pages).
// ============================================================================
import PDFDocument from "pdfkit";
import { AppError } from "./middleware/errorHandler.js";
import { MEAL_TYPES, type SessionState } from "./types.js";

export const REPORT_FILE_NAME = "PCOS_Health_Report.pdf";
export const REPORT_TITLE = "PCOS Health Report";

export type ReportSection = {
  heading: string | null;
  lines: string[];
};

export type ReportDocument = {
  title: string;
  fileName: string;
  sections: ReportSection[];
};

export function buildReport(state: SessionState): ReportDocument {
  const { prediction, exercisePlan, mealPlan } = state;
  if (state.step !== "summary" || !prediction || !exercisePlan || !mealPlan) {
    throw new AppError("Report is available once the summary step is reached", 409, {
      code: "REPORT_NOT_READY",
      details: { step: state.step },
    });
  }

  return {
    title: REPORT_TITLE,
    fileName: REPORT_FILE_NAME,
    sections: [
      {
        heading: null,
        lines: [
          `Patient Name: ${state.userName ?? ""}`,
          `Risk Probability: ${prediction.probability.toFixed(2)}%`,
          `BMI: ${prediction.bmi.toFixed(2)}`,
          `Assessment: ${prediction.label === 1 ? "High PCOS Risk" : "Low PCOS Risk"}`,
        ],
      },
      {
        heading: "Weekly Exercise Plan",
        lines: exercisePlan.map((slot) => `${slot.day}: ${slot.text}`),
      },
      {
        heading: "Weekly Diet Plan",
        lines: mealPlan.flatMap((entry) =>
          MEAL_TYPES.map((mealType) => `${entry.day} - ${mealType}: ${entry.meals[mealType]}`)
        ),
      },
    ],
  };
}

/** Built-in PDF fonts only cover Latin-1; anything else (emoji etc.) is dropped. */
export function toPdfText(text: string): string {
  return text
    .replace(/[^\x20-\x7E\u00A0-\u00FF]/g, "")
    .replace(/\s{2,}/g, " ")
    .trim();
}

export function renderReportPdf(report: ReportDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "A4", margin: 56, info: { Title: report.title } });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.font("Helvetica-Bold").fontSize(20).text(toPdfText(report.title), { align: "center" });
    doc.moveDown(1.5);

    for (const section of report.sections) {
      if (section.heading) {
        doc.font("Helvetica-Bold").fontSize(14).text(toPdfText(section.heading));
        doc.moveDown(0.5);
      }
      doc.font("Helvetica").fontSize(11);
      for (const line of section.lines) {
        doc.text(toPdfText(line));
      }
      doc.moveDown(1);
    }

    doc.end();
  });
}
