import { createInsightsContext, failureResponse, insightResponse } from "@/lib/api/insights-route";
import { getImportance } from "@/lib/domain/insights-service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const { store } = createInsightsContext();
    const metrics = await getImportance(store);
    return insightResponse("importance", { metrics });
  } catch (error) {
    return failureResponse("Falha ao calcular a importância das disciplinas.", error);
  }
}
