import type { GraphQuery } from "../stores/graphStore";

export const MIN_HOPS = 2;
export const MAX_HOPS = 3;

const RELATION_HINTS: Array<{ pattern: RegExp; types: string[] }> = [
  { pattern: /\b(?:cause|causes|caused|lead to|leads to|result in|results in|because|why)\b/i, types: ["CAUSES", "LEADS_TO", "RESULTS_IN"] },
  { pattern: /\b(?:influence|influenced|inspire|inspired|shaped)\b/i, types: ["INFLUENCES", "INSPIRED"] },
  { pattern: /\b(?:differ|difference|contrast|compare|versus|vs\.?)\b/i, types: ["CONTRASTS_WITH", "OPPOSES", "RELATED_TO"] },
  { pattern: /\b(?:part of|belong|belongs|consist|includes?)\b/i, types: ["PART_OF", "INCLUDES"] }
];

/** Relationship types the wording of the question points at, used to prefer matching paths. */
export function relationHints(query: string): string[] {
  return [...new Set(RELATION_HINTS.filter(({ pattern }) => pattern.test(query)).flatMap(({ types }) => types))];
}

export function clampHops(maxHops: number): number {
  if (!Number.isFinite(maxHops)) {
    return MAX_HOPS;
  }
  return Math.min(MAX_HOPS, Math.max(MIN_HOPS, Math.trunc(maxHops)));
}

function searchTerms(terms: readonly string[]): string[] {
  return [...new Set(terms.map((term) => term.trim().toLowerCase()).filter((term) => term.length > 1))];
}

const TERM_MATCH = `any(term IN $terms WHERE toLower(n.name) CONTAINS term OR toLower(coalesce(n.description, '')) CONTAINS term)`;

export function buildNodeLookupQuery(workspaceId: string, terms: readonly string[], limit = 50): GraphQuery {
  return {
    kind: "node_lookup",
    text: `MATCH (n)
WHERE n.workspace_id = $workspaceId
  AND any(term IN $terms WHERE toLower(n.name) CONTAINS term
      OR any(alias IN coalesce(n.aliases, []) WHERE toLower(alias) = term))
RETURN n.id AS id, n.name AS name, coalesce(n.aliases, []) AS aliases
LIMIT $limit`,
    params: { workspaceId, terms: searchTerms(terms), limit }
  };
}

export function buildNodeSampleQuery(workspaceId: string, limit = 100): GraphQuery {
  return {
    kind: "node_sample",
    text: `MATCH (n)
WHERE n.workspace_id = $workspaceId AND n.name IS NOT NULL
RETURN n.id AS id, n.name AS name, coalesce(n.aliases, []) AS aliases
ORDER BY size(coalesce(n.document_ids, [])) DESC, n.name ASC
LIMIT $limit`,
    params: { workspaceId, limit }
  };
}

export function buildEntityCentricQuery(
  workspaceId: string,
  nodeIds: readonly string[],
  terms: readonly string[],
  limit: number
): GraphQuery {
  return {
    kind: "entity_centric",
    text: `MATCH (n)
WHERE n.workspace_id = $workspaceId AND (n.id IN $nodeIds OR (size($nodeIds) = 0 AND ${TERM_MATCH}))
OPTIONAL MATCH (n)-[r]-(m)
WHERE m.workspace_id = $workspaceId
WITH n, collect(DISTINCT {type: type(r), target: m.name, outgoing: startNode(r) = n})[0..$relationLimit] AS relations
RETURN n.id AS id, n.name AS name, labels(n)[0] AS type, n.description AS description,
       coalesce(n.document_ids, []) AS documentIds, relations,
       CASE WHEN n.id IN $nodeIds THEN 1.0 ELSE 0.5 END + toFloat(size(relations)) / 100.0 AS score
ORDER BY score DESC, n.name ASC
LIMIT $limit`,
    params: { workspaceId, nodeIds: [...nodeIds], terms: searchTerms(terms), relationLimit: 8, limit }
  };
}

/**
 * Undirected variable-length traversal from the linked nodes. Cypher cannot bind
 * the depth of a variable-length pattern, so the clamped integer is inlined.
 */
export function buildMultiHopQuery(
  workspaceId: string,
  nodeIds: readonly string[],
  maxHops: number,
  preferredRelations: readonly string[],
  limit: number
): GraphQuery {
  const hops = clampHops(maxHops);
  return {
    kind: "multi_hop",
    text: `MATCH (start)
WHERE start.workspace_id = $workspaceId AND start.id IN $nodeIds
MATCH path = (start)-[*1..${hops}]-(end)
WHERE end.workspace_id = $workspaceId AND end <> start
WITH start, end, length(path) AS hops,
     [r IN relationships(path) | type(r)] AS relationTypes,
     [x IN nodes(path) | x.name] AS nodeNames
WITH start, end, hops, relationTypes, nodeNames,
     size([t IN relationTypes WHERE t IN $preferredRelations]) AS preferred
RETURN start.id AS startId, start.name AS startName, end.id AS endId, end.name AS endName,
       end.description AS description, hops, relationTypes, nodeNames,
       coalesce(end.document_ids, []) AS documentIds,
       toFloat(preferred) + toFloat(size(coalesce(end.document_ids, []))) / 100.0 AS score
ORDER BY hops ASC, score DESC
LIMIT $limit`,
    params: { workspaceId, nodeIds: [...nodeIds], preferredRelations: [...preferredRelations], limit }
  };
}

export function buildCrossSourceQuery(
  workspaceId: string,
  nodeIds: readonly string[],
  terms: readonly string[],
  limit: number
): GraphQuery {
  return {
    kind: "cross_source",
    text: `MATCH (n)
WHERE n.workspace_id = $workspaceId
  AND (n.id IN $nodeIds OR size($nodeIds) = 0 AND (size($terms) = 0 OR ${TERM_MATCH}))
WITH n, reduce(acc = [], d IN coalesce(n.document_ids, []) | CASE WHEN d IN acc THEN acc ELSE acc + d END) AS documentIds
WHERE size(documentIds) > 1
RETURN n.id AS id, n.name AS name, labels(n)[0] AS type, n.description AS description,
       documentIds, size(documentIds) AS documentCount
ORDER BY documentCount DESC, n.name ASC
LIMIT $limit`,
    params: { workspaceId, nodeIds: [...nodeIds], terms: searchTerms(terms), limit }
  };
}
