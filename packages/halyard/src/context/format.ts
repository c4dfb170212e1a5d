import type { Turn } from "./types.js";

/**
 * Renders turns as readable transcript text, used as summarization input.
 */
export function formatTurnsForSummary(turns: readonly Turn[]): string {
  return turns
    .map((turn) => {
      const lines = [`[${turn.seq}] ${turn.role}: ${turn.content}`];
      for (const call of turn.toolCalls) {
        lines.push(`  call ${call.id} ${call.name} ${JSON.stringify(call.arguments)}`);
      }
      for (const result of turn.toolResults) {
        const body = result.success ? (result.output ?? "") : `error (${result.error?.kind}): ${result.error?.message}`;
        lines.push(`  result ${result.callId}: ${body}`);
      }
      return lines.join("\n");
    })
    .join("\n\n");
}
