import type { NormalizedType, TicketRecord } from "~/types/tickets";
import type { TypeKeywords } from "./vocabulary.server";

type TypeSource = Pick<TicketRecord, "issueType" | "project">;

/**
 * Incident keywords win over request keywords when both appear, so
 * "Service Request - Incidente" is an Incident.
 */
export function classifyTicketType({ issueType, project }: TypeSource, keywords: TypeKeywords): NormalizedType {
  const text = [issueType, project]
    .filter((part): part is string => part !== null)
    .map((part) => ` ${part}`)
    .join("")
    .toLowerCase();

  if (keywords.incident.some((keyword) => text.includes(keyword))) return "Incident";
  if (keywords.request.some((keyword) => text.includes(keyword))) return "Request";
  return "Other";
}
