import type { InsightKind } from "@/types/curriculum";

export const INSIGHT_EXPLANATIONS: Record<InsightKind, string> = {
  cycles:
    "Detecta ciclos na grade de pré-requisitos. Ciclos impedem a ordenação topológica e deixam disciplinas impossíveis de cursar; todos os ciclos elementares são listados para correção em uma única revisão.",
  importance:
    "Identifica disciplinas que desbloqueiam muitas outras (alcance) ou que fazem ponte entre áreas (intermediação), para priorizar a alocação de docentes e recursos.",
  graph: "Representação de nós e arestas do grafo de pré-requisitos.",
  recommendations:
    "Disciplinas que o estudante já pode cursar, considerando apenas as disciplinas concluídas; as com menos pré-requisitos aparecem primeiro.",
  graduation_path:
    "Ordem viável (topológica) para concluir as disciplinas obrigatórias restantes, respeitando os pré-requisitos entre elas. Lista vazia com disciplinas pendentes indica ciclo.",
  progress:
    "Posições, situação e nome de cada disciplina no grafo curricular, para o painel de progresso do estudante."
};

export function explainInsight(kind: InsightKind): string {
  return INSIGHT_EXPLANATIONS[kind];
}
