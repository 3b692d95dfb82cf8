import type { AppContext } from "../app/context.js";
import { createClassifier } from "../core/classifier.js";
import { describeParseError, parseLine } from "../core/event-parser.js";
import type { ClassifiedEvent, ParseError } from "../core/events.js";

export type ExplainResult = { ok: true; event: ClassifiedEvent } | { ok: false; error: ParseError };

// Parses and classifies a single line, printing what the pipeline would do with it.
export function explainCommand(appContext: AppContext, line: string): ExplainResult {
  const { config } = appContext;
  const parsed = parseLine(line, 1, config.log_format);

  if (!parsed.ok) {
    console.log(`rejected: ${describeParseError(parsed.error)}`);
    return parsed;
  }

  const event = createClassifier(config.classifier.rules).classify(parsed.event);
  console.log(JSON.stringify(event, null, 2));
  console.log(`status: ${event.status} (rule: ${event.rule ?? "none matched"})`);
  return { ok: true, event };
}
