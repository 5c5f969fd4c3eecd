import nunjucks from 'nunjucks';
import type { ResearchState } from './state';

export const DEFAULT_SYSTEM_PROMPT = `You are an advanced research assistant. You can:
1. Search the web for information
2. Look up internal documents
3. Perform calculations and analysis
4. Request human approval for sensitive topics

Current research progress: {{ progress | join(", ") }}
Sources found: {% if sources | length %}{{ sources | join(", ") }}{% else %}none yet{% endif %}

Be thorough and helpful. For sensitive topics like politics, controversies,
or personal information, use the request_human_approval tool first.`;

export const DEFAULT_SUMMARY_PROMPT = `Based on the research conversation above, provide a comprehensive summary including:
1. Main research query: {{ query or "Not specified" }}
2. Key findings from sources
3. Important data points or calculations
4. Conclusions and recommendations

Research progress: {{ progress | join(", ") }}
Sources consulted: {% if sources | length %}{{ sources | join(", ") }}{% else %}none{% endif %}

Provide a well-structured summary.`;

// Prompts are plain text sent to the model, not HTML.
const environment = new nunjucks.Environment(null, { autoescape: false });

export function renderPrompt(template: string, state: Readonly<ResearchState>): string {
    return environment.renderString(template, {
        query: state.researchQuery,
        progress: state.researchProgress,
        sources: state.sourcesFound
    });
}
