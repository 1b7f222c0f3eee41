import type { ResultItem, ResultSet } from "@/types/search";

export const NO_RESULTS_MESSAGE = "No search results found to summarize.";

const BLOCK_SEPARATOR = "\n\n---\n\n";

function formatItem(item: ResultItem, index: number): string {
  const lines = [`[${index + 1}] ${item.title.length > 0 ? item.title : "(untitled)"}`, `Source: ${item.source}`];
  if (item.url.length > 0) {
    lines.push(`URL: ${item.url}`);
  }
  if (item.content.length > 0) {
    lines.push(`Snippet: ${item.content}`);
  }
  return lines.join("\n");
}

export function formatCitations(resultSet: ResultSet): string {
  return resultSet.results.map(formatItem).join(BLOCK_SEPARATOR);
}

export function buildSummaryPrompt(query: string, resultSet: ResultSet): string | null {
  if (resultSet.results.length === 0) {
    return null;
  }

  return [
    `Based on the following search results, write a clear, concise summary answering my latest prompt: "${query.trim()}".`,
    "Cite the results you rely on by their number, e.g. [1].",
    "",
    "Search Results:",
    formatCitations(resultSet)
  ].join("\n");
}
