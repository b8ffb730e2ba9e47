/**
 * Metadata Extractor
 *
 * Scans the lines above the table body for the hospital, client and
 * patient names and the inspection date. Each field collects scored
 * candidates; the best one wins, with a slight preference for lines
 * closer to the table.
 */

import type { DocumentMetadata, Line, Token } from "./types.js";
import { DATE_LIKE_RE, median } from "./patterns.js";
import { matchHeaderWord } from "./header/ocr-header.js";

type NameField = "client_name" | "patient_name";

interface Candidate {
  value: string;
  score: number;
  lineIndex: number;
}

const HOSPITAL_SUFFIXES: Array<{ pattern: RegExp; bonus: number }> = [
  { pattern: /animal hospital/i, bonus: 1.4 },
  { pattern: /veterinary hospital/i, bonus: 1.3 },
  { pattern: /animal medical cent(?:er|re)/i, bonus: 1.2 },
  { pattern: /veterinary (?:clinic|cent(?:er|re))/i, bonus: 1.1 },
  { pattern: /(?:vet|pet|animal) clinic/i, bonus: 0.9 },
  { pattern: /동물병원/, bonus: 1.6 },
  { pattern: /동물의료센터/, bonus: 1.2 },
];

// optional "Clinic:" style label, then the name up to its suffix
const HOSPITAL_RE =
  /^(?:(?:hospital|clinic|병원명?|기관명?)\s*[:：]\s*)?(.{0,60}?(?:animal hospital|veterinary hospital|animal medical cent(?:er|re)|veterinary (?:clinic|cent(?:er|re))|(?:vet|pet|animal) clinic|동물병원|동물의료센터))/i;

const CONTACT_RE = /\b(?:tel|fax|e-?mail|address|mobile)\b|https?:|www\.|@|전화|주소/i;

const NAME_LABELS: Record<NameField, string[]> = {
  client_name: ["owner", "client", "guardian", "보호자", "의뢰인", "고객명"],
  patient_name: ["patient", "pet", "animal", "name", "환자", "환자명", "동물명", "이름"],
};

const LABEL_SCORES: Record<NameField, number> = {
  client_name: 0.9,
  patient_name: 1.0,
};

const SEPARATOR_RE = /^[:：\-–]+$/;
const LONG_NUMBER_RE = /^\d{6,}$/;

const DATE_RE = /(?<!\d)(\d{4}|\d{2})[-./](\d{1,2})[-./](\d{1,2})(?!\d)/g;

const DATE_CONTEXT: Array<{ pattern: RegExp; weight: number }> = [
  { pattern: /collection|collected|sampled|검사일|채혈/i, weight: 2 },
  { pattern: /date|일자/i, weight: 0.5 },
  { pattern: /report|printed|issued|received|보고|출력|발행/i, weight: -1.5 },
];

function lineText(line: Line): string {
  return line.tokens.map((t) => t.text).join(" ");
}

function labelKey(text: string): string {
  return text.toLowerCase().replace(/[:：\-–]+$/, "");
}

/**
 * Plausible person or pet name: short, not only digits or punctuation,
 * not a sex field.
 */
export function looksLikeName(value: string): boolean {
  const text = value.trim();
  if (!text || text.length > 40) return false;
  if (/^[\d\s\p{P}\p{S}]+$/u.test(text)) return false;
  return !/\b(?:male|female)\b|sex\s*:/i.test(text);
}

/**
 * Converts a matched date to YYYY-MM-DD. Two-digit years are read as 20YY.
 * Returns null for impossible calendar dates.
 */
export function normalizeDate(
  year: string,
  month: string,
  day: string,
): string | null {
  const y = year.length === 2 ? 2000 + Number(year) : Number(year);
  const m = Number(month);
  const d = Number(day);
  if (m < 1 || m > 12 || d < 1) return null;
  const daysInMonth = new Date(Date.UTC(y, m, 0)).getUTCDate();
  if (d > daysInMonth) return null;
  return `${String(y).padStart(4, "0")}-${String(m).padStart(2, "0")}-${String(d).padStart(2, "0")}`;
}

function dateContextScore(text: string): number {
  return DATE_CONTEXT.reduce(
    (score, { pattern, weight }) => (pattern.test(text) ? score + weight : score),
    0,
  );
}

function dateCandidates(line: Line): Candidate[] {
  const text = lineText(line);
  const context = dateContextScore(text);
  if (context <= -0.5) return [];

  for (const match of text.matchAll(DATE_RE)) {
    const [, year, month, day] = match;
    const iso = normalizeDate(year, month, day);
    if (!iso) continue;
    const formatScore = year.length === 4 ? 1.5 : 0.7;
    return [{ value: iso, score: context + formatScore, lineIndex: line.index }];
  }
  return [];
}

/**
 * Number of leading tokens whose joined text fits in the first `length`
 * characters of the line text.
 */
function tokensCovering(tokens: Token[], length: number): number {
  let end = 0;
  let count = 0;
  for (const token of tokens) {
    end += token.text.length;
    if (end > length) break;
    count++;
    end += 1;
  }
  return count;
}

function hospitalCandidate(
  line: Line,
  position: number,
): { candidate: Candidate; tokenCount: number } | null {
  const text = lineText(line).replace(/\s+/g, " ").trim();
  if (CONTACT_RE.test(text)) return null;

  const match = HOSPITAL_RE.exec(text);
  if (!match) return null;
  const value = match[1].trim();
  if (value.length < 4 || value.length > 80) return null;

  const suffix = HOSPITAL_SUFFIXES.find(({ pattern }) => pattern.test(value));
  const score =
    1 +
    (suffix?.bonus ?? 0.8) +
    Math.min(value.length / 20, 1) -
    0.2 * Math.log1p(position);
  return {
    candidate: { value, score, lineIndex: line.index },
    tokenCount: tokensCovering(line.tokens, match[0].length),
  };
}

function isHeaderLike(line: Line): boolean {
  const words = new Set(
    line.tokens.map((t) => matchHeaderWord(t.text)).filter((w) => w !== null),
  );
  return words.size >= 2;
}

function labelField(text: string): NameField | null {
  const key = labelKey(text);
  if (NAME_LABELS.client_name.includes(key)) return "client_name";
  if (NAME_LABELS.patient_name.includes(key)) return "patient_name";
  return null;
}

function isStopToken(token: Token): boolean {
  return (
    LONG_NUMBER_RE.test(token.text) ||
    DATE_LIKE_RE.test(token.text) ||
    /[:：]$/.test(token.text)
  );
}

/**
 * Joins up to three tokens right of the label while they stay within the
 * line's typical word spacing, measured from the label itself for the
 * first one. The spacing is capped at four token heights.
 */
function valueAfterLabel(tokens: Token[], labelIndex: number): string | null {
  const gaps = tokens
    .slice(1)
    .map((t, i) => t.bbox.left - tokens[i].bbox.right);
  const heights = tokens.map((t) => t.height);
  const maxGap = Math.max(16, Math.min(1.8 * median(gaps), 4 * median(heights)));

  let i = labelIndex + 1;
  while (
    i < tokens.length &&
    (SEPARATOR_RE.test(tokens[i].text) || labelField(tokens[i].text) !== null)
  ) {
    i++;
  }

  const parts: Token[] = [];
  let anchor = tokens[i - 1];
  for (; i < tokens.length && parts.length < 3; i++) {
    const token = tokens[i];
    if (isStopToken(token)) break;
    if (token.bbox.left - anchor.bbox.right > maxGap) break;
    parts.push(token);
    anchor = token;
  }
  return parts.length > 0 ? parts.map((t) => t.text).join(" ") : null;
}

/**
 * Value glued to its label ("Owner:Jane"), read from the raw text.
 */
function gluedValue(text: string): { field: NameField; value: string } | null {
  const match = /^([^:：]+)[:：]\s*(.+)$/.exec(text);
  if (!match) return null;
  const field = labelField(match[1]);
  return field ? { field, value: match[2].trim() } : null;
}

function nameCandidates(line: Line): Array<Candidate & { field: NameField }> {
  const found: Array<Candidate & { field: NameField }> = [];
  const headerLike = isHeaderLike(line);
  const { tokens } = line;

  tokens.forEach((token, i) => {
    // "Patient Name:" is one label
    if (i > 0 && labelField(tokens[i - 1].text) !== null) return;

    let field = labelField(token.text);
    let value: string | null = null;
    if (field) {
      value = valueAfterLabel(tokens, i);
    } else {
      const glued = gluedValue(token.text);
      if (glued) {
        field = glued.field;
        value = glued.value;
      }
    }
    if (!field || !value) return;
    if (field === "patient_name" && labelKey(token.text) === "name" && headerLike) {
      return;
    }
    if (headerLike && field === "client_name") return;
    if (!looksLikeName(value)) return;

    found.push({
      field,
      value,
      score: LABEL_SCORES[field],
      lineIndex: line.index,
    });
  });
  return found;
}

function pickBest(candidates: Candidate[]): string | undefined {
  let best: { value: string; key: number } | undefined;
  for (const candidate of candidates) {
    const key = candidate.score + 0.1 * Math.log1p(candidate.lineIndex);
    if (!best || key > best.key) best = { value: candidate.value, key };
  }
  return best?.value;
}

export function extractMetadata(headerLines: Line[]): DocumentMetadata {
  const hospitals: Candidate[] = [];
  const dates: Candidate[] = [];
  const names: Record<NameField, Candidate[]> = {
    client_name: [],
    patient_name: [],
  };

  headerLines.forEach((line, position) => {
    dates.push(...dateCandidates(line));

    let nameLine = line;
    const hospital = hospitalCandidate(line, position);
    if (hospital) {
      hospitals.push(hospital.candidate);
      // "Animal" in a hospital name is not a patient label
      nameLine = { ...line, tokens: line.tokens.slice(hospital.tokenCount) };
    }

    for (const { field, ...candidate } of nameCandidates(nameLine)) {
      names[field].push(candidate);
    }
  });

  const metadata: DocumentMetadata = {};
  const hospital = pickBest(hospitals);
  const client = pickBest(names.client_name);
  const patient = pickBest(names.patient_name);
  const date = pickBest(dates);
  if (hospital) metadata.hospital_name = hospital;
  if (client) metadata.client_name = client;
  if (patient) metadata.patient_name = patient;
  if (date) metadata.inspection_date = date;
  return metadata;
}
