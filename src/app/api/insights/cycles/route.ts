import { createInsightsContext, failureResponse, insightResponse } from "@/lib/api/insights-route";
import { getCycles } from "@/lib/domain/insights-service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const { config, store } = createInsightsContext();
    const report = await getCycles(store, { maxCycles: config.maxCycles });
    return insightResponse("cycles", {
      cycles: report.cycles,
      cyclesCount: report.cyclesCount,
      truncated: report.truncated
    });
  } catch (error) {
    return failureResponse("Falha ao detectar ciclos na grade.", error);
  }
}
