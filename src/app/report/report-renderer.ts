import { ReportError } from "../../core/errors.js";
import { reportJsonPath } from "../../core/paths.js";
import type { ReportDocument } from "../../core/report-sections.js";
import { writeJsonFile } from "../../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

// Document renderers (PDF, HTML) implement this outside the core.
export interface ReportRenderer {
  render(document: ReportDocument): Promise<string>;
}

// =============================================================================
// JSON RENDERER
// =============================================================================

export class JsonReportRenderer implements ReportRenderer {
  constructor(private readonly outputDir: string) {}

  async render(document: ReportDocument): Promise<string> {
    const filePath = reportJsonPath(this.outputDir, document.runId);
    try {
      await writeJsonFile(filePath, document);
    } catch (err) {
      throw new ReportError(`Failed to write report to ${filePath}`, err);
    }
    return filePath;
  }
}
