import type { Prompt } from '@hemascope/shared/src/types/analysis.types.js';
import type { ContextExchange } from '@hemascope/shared/src/types/chat.types.js';
import type { PatientProfile } from '@hemascope/shared/src/types/document.types.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { ConfigurationError } from '@hemascope/shared/src/utils/errors.js';
import { REPORT_ANALYSIS_TEMPLATE, type PromptTemplate } from './report-analysis.prompt.js';

const log = createChildLogger('prompts:builder');

export const TRUNCATION_MARKER = '\n[report truncated]';
const SESSION_HISTORY_HEADING = '\n\n## Current Session History\n';
const REPORT_HEADING = '## Blood Report\n';

export interface PromptInput {
  readonly extractedText: string;
  readonly priorContext?: readonly ContextExchange[];
  readonly patient?: PatientProfile;
}

export interface PromptBuilder {
  build(input: PromptInput): Prompt;
}

export interface PromptBuilderConfig {
  readonly maxPromptChars: number;
  readonly template?: PromptTemplate;
}

function renderPatientHeader(patient: PatientProfile | undefined): string {
  const lines: string[] = [];
  if (patient?.age !== undefined) {
    lines.push(`Age: ${String(patient.age)}`);
  }
  const gender = patient?.gender?.trim();
  if (gender) {
    lines.push(`Gender: ${gender}`);
  }
  return lines.length > 0 ? `## Patient Profile\n${lines.join('\n')}\n\n` : '';
}

function renderSessionHistory(exchanges: readonly ContextExchange[]): string {
  if (exchanges.length === 0) {
    return '';
  }
  const body = exchanges
    .map((exchange) => `User: ${exchange.user}\nAssistant: ${exchange.assistant}`)
    .join('\n\n');
  return `${SESSION_HISTORY_HEADING}${body}`;
}

/**
 * Renders the analysis prompt within `maxPromptChars` (system + user message).
 * Over budget, prior-context exchanges go first (oldest first), then the tail of the report.
 */
export function createPromptBuilder(config: PromptBuilderConfig): PromptBuilder {
  const template = config.template ?? REPORT_ANALYSIS_TEMPLATE;

  return {
    build(input: PromptInput): Prompt {
      const userPrefix = `${renderPatientHeader(input.patient)}${REPORT_HEADING}`;
      const fixedLength = template.instructions.length + userPrefix.length;

      if (fixedLength > config.maxPromptChars) {
        throw new ConfigurationError(
          `Prompt template "${template.id}" needs ${String(fixedLength)} characters but maxPromptChars is ${String(config.maxPromptChars)}`,
        );
      }

      let exchanges = input.priorContext ?? [];
      let history = renderSessionHistory(exchanges);
      let truncated = false;
      const reportLength = input.extractedText.length;

      while (
        exchanges.length > 0 &&
        fixedLength + history.length + reportLength > config.maxPromptChars
      ) {
        exchanges = exchanges.slice(1);
        history = renderSessionHistory(exchanges);
        truncated = true;
      }

      let report = input.extractedText;
      if (fixedLength + history.length + reportLength > config.maxPromptChars) {
        const available = config.maxPromptChars - fixedLength - history.length;
        // the marker is dropped when the budget cannot hold it
        report =
          available >= TRUNCATION_MARKER.length
            ? `${report.slice(0, available - TRUNCATION_MARKER.length)}${TRUNCATION_MARKER}`
            : report.slice(0, available);
        truncated = true;
      }

      if (truncated) {
        log.info(
          {
            templateId: template.id,
            reportChars: reportLength,
            keptReportChars: report.length,
            droppedExchanges: (input.priorContext?.length ?? 0) - exchanges.length,
          },
          'Prompt truncated to fit the character budget',
        );
      }

      return {
        systemPrompt: `${template.instructions}${history}`,
        userMessage: `${userPrefix}${report}`,
        truncated,
        responseFormat: template.responseFormat,
        expectedSections: template.sections,
        contextExchanges: exchanges.length,
      };
    },
  };
}
