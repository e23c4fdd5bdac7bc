import { createInsightsContext, failureResponse, insightResponse } from "@/lib/api/insights-route";
import { getGraph } from "@/lib/domain/insights-service";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const { store } = createInsightsContext();
    const { nodes, edges } = await getGraph(store);
    return insightResponse("graph", {
      nodesCount: nodes.length,
      nodes,
      edgesCount: edges.length,
      edges
    });
  } catch (error) {
    return failureResponse("Falha ao carregar o grafo de pré-requisitos.", error);
  }
}
