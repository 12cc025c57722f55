import type { Citation, Provenance, RankedItem } from "./types";

const SPEAKER_CODE = /^speaker[_\s-]?(\d+)$/i;

export function formatTimestamp(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;
  return [hours, minutes, rest].map((part) => String(part).padStart(2, "0")).join(":");
}

export function formatLocator(provenance: Readonly<Provenance>): string {
  const { locator } = provenance;
  if (typeof locator === "number") {
    return formatTimestamp(locator);
  }
  if (typeof locator === "string") {
    if (/^\d+(?:\.\d+)?$/.test(locator)) {
      return formatTimestamp(Number(locator));
    }
    return locator;
  }
  if (provenance.relationPath && provenance.relationPath.length > 0) {
    return `${provenance.hopCount ?? provenance.relationPath.length}-hop path via ${provenance.relationPath.join(" > ")}`;
  }
  if (provenance.documentIds && provenance.documentIds.length > 1) {
    return `${provenance.documentIds.length} documents`;
  }
  return "knowledge graph";
}

export function humanizeIdentifier(identifier: string): string {
  const cleaned = identifier
    .replace(/^graph:/, "")
    .replace(/\.[a-z0-9]{2,4}$/i, "")
    .replace(/[_-]+/g, " ")
    .trim();
  if (cleaned.length === 0) {
    return "Unknown document";
  }
  return cleaned.replace(/\b\p{L}/gu, (letter) => letter.toUpperCase());
}

export function documentLabel(provenance: Readonly<Provenance>): string {
  return provenance.documentTitle ?? humanizeIdentifier(provenance.documentId);
}

export function speakerLabel(provenance: Readonly<Provenance>): string {
  if (provenance.speakerName) {
    return provenance.speakerName;
  }
  if (provenance.speaker) {
    const code = SPEAKER_CODE.exec(provenance.speaker);
    return code ? `Speaker ${Number(code[1]) + 1}` : provenance.speaker;
  }
  return "Unknown speaker";
}

export function toCitation(item: RankedItem, topScore: number): Citation {
  const confidence = topScore > 0 ? Math.min(1, Math.max(0, item.fusionScore / topScore)) : 0;
  return {
    sourceType: item.sourceType,
    documentLabel: documentLabel(item.provenance),
    locator: formatLocator(item.provenance),
    speakerLabel: speakerLabel(item.provenance),
    confidence: Math.round(confidence * 100) / 100
  };
}
