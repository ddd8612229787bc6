// src/chatbot.ts
/**
 * Keyword-based message parser for the chat log.
 *
 * There is no grammar here: a message is scanned for known keywords
 * (Korean and English), and a quantity is read from the text right
 * around each keyword.
 */
import fs from "fs";
import { z } from "zod";
import { ACTION_CATEGORIES, dataFilePath } from "./factorRepository";
import type { ActionCategory } from "./factorRepository";
import type { ImpactResult } from "./impactEngine";
import { titleCaseItem } from "./format";

export type ParsedAction = {
  category: ActionCategory;
  item: string;
  amount: number;
  confidence: number;
  original_text: string;
};

export type KeywordEntry = {
  item: string;
  category: ActionCategory;
};

export type AnalyzedAction = ParsedAction & ImpactResult;

export const KEYWORDS_FILE = "chat_keywords.json";

// Characters scanned on each side of a keyword for its quantity.
const QUANTITY_WINDOW = 20;

const CONFIDENCE_WITH_NUMBER = 0.8;
const CONFIDENCE_DEFAULT = 0.6;

// Unit-suffixed patterns first; a bare number is the last resort.
const NUMBER_PATTERNS: readonly RegExp[] = [
  /(\d+(?:\.\d+)?)\s*(?:km|킬로|킬로미터)/,
  /(\d+(?:\.\d+)?)\s*(?:번|개|잔|벌|켤레|인분)/,
  /(\d+(?:\.\d+)?)\s*(?:kWh|킬로와트)/,
  /(\d+(?:\.\d+)?)\s*(?:시간|분)/,
  /(\d+(?:\.\d+)?)/,
];

const KeywordGroupSchema = z.object({
  category: z.enum(ACTION_CATEGORIES),
  keywords: z.record(z.string().min(1), z.string().min(1)),
});

const KeywordFileSchema = z.record(z.string(), KeywordGroupSchema);

function loadKeywordDictionary(): ReadonlyMap<string, Readonly<KeywordEntry>> {
  const filePath = dataFilePath(KEYWORDS_FILE);
  const parsed = KeywordFileSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf8")));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Malformed keyword file ${filePath}: ${issues}`);
  }

  const dictionary = new Map<string, Readonly<KeywordEntry>>();
  for (const [groupName, group] of Object.entries(parsed.data)) {
    for (const [rawKeyword, item] of Object.entries(group.keywords)) {
      const keyword = rawKeyword.toLowerCase();
      if (dictionary.has(keyword)) {
        throw new Error(`Keyword '${keyword}' is defined twice (second time in '${groupName}')`);
      }
      dictionary.set(keyword, Object.freeze({ item, category: group.category }));
    }
  }
  return dictionary;
}

/** Keyword -> (item, category), in file order. Built once at module load. */
export const KEYWORDS: ReadonlyMap<string, Readonly<KeywordEntry>> = loadKeywordDictionary();

/**
 * First quantity found in `text`, trying unit-suffixed patterns before a
 * bare number. `null` when the text holds no number at all.
 */
export function extractNumber(text: string): number | null {
  for (const pattern of NUMBER_PATTERNS) {
    const match = text.match(pattern);
    if (match) return parseFloat(match[1]);
  }
  return null;
}

type KeywordHit = KeywordEntry & { pos: number; keyword: string };

/**
 * Parse a chat message into candidate actions, ordered by where their keyword
 * first appears. Each item is reported once, for its earliest keyword.
 *
 * The quantity comes from a fixed window around the keyword, so two actions
 * written close together can pick up each other's number.
 *
 * @example
 * parseMessage("커피 2잔 마셨어")
 * // [{ category: "purchase", item: "coffee", amount: 2, confidence: 0.8, ... }]
 */
export function parseMessage(message: string): ParsedAction[] {
  const lowered = message.toLowerCase();

  const hits: KeywordHit[] = [];
  for (const [keyword, entry] of KEYWORDS) {
    const pos = lowered.indexOf(keyword);
    if (pos !== -1) hits.push({ ...entry, keyword, pos });
  }

  hits.sort((a, b) => a.pos - b.pos);

  const seenItems = new Set<string>();
  const actions: ParsedAction[] = [];

  for (const hit of hits) {
    if (seenItems.has(hit.item)) continue;
    seenItems.add(hit.item);

    const start = Math.max(0, hit.pos - QUANTITY_WINDOW);
    const end = Math.min(message.length, hit.pos + hit.keyword.length + QUANTITY_WINDOW);
    const quantity = extractNumber(message.slice(start, end));

    actions.push({
      category: hit.category,
      item: hit.item,
      amount: quantity ?? 1.0,
      confidence: quantity === null ? CONFIDENCE_DEFAULT : CONFIDENCE_WITH_NUMBER,
      original_text: message,
    });
  }

  return actions;
}

// ---- reply text -----------------------------------------------------------

export const NOT_UNDERSTOOD_MESSAGE = `죄송합니다, 입력하신 내용에서 행동을 인식하지 못했습니다.

다음과 같이 말씀해 주세요:
- "오늘 택시로 5km 이동했어"
- "점심에 소고기 먹었어"
- "커피 2잔 마셨어"
- "전기 10kWh 사용했어"

어떤 활동을 하셨나요?`;

const CATEGORY_EMOJI: Record<ActionCategory, string> = {
  mobility: "🚗",
  purchase: "🛒",
  home_energy: "🏠",
};

/**
 * Markdown reply for analyzed actions. An empty list gets the guidance message.
 */
export function generateResponse(entries: readonly AnalyzedAction[]): string {
  if (!entries.length) return NOT_UNDERSTOOD_MESSAGE;

  const lines = ["📊 **오늘의 활동 분석**\n"];

  let totalCo2e = 0;
  let totalWater = 0;

  for (const a of entries) {
    totalCo2e += a.co2e_kg;
    totalWater += a.water_l;

    lines.push(`${CATEGORY_EMOJI[a.category]} **${titleCaseItem(a.item)}** (${a.amount})`);
    lines.push(`   - CO₂e: ${a.co2e_kg.toFixed(3)} kg`);
    if (a.water_l > 0) lines.push(`   - 물: ${a.water_l.toFixed(1)} L`);
    lines.push("");
  }

  lines.push("---");
  lines.push("**📈 총 영향**");
  lines.push(`- 탄소 발자국: **${totalCo2e.toFixed(3)} kg CO₂e**`);
  if (totalWater > 0) lines.push(`- 물 발자국: **${totalWater.toFixed(1)} L**`);

  lines.push("");
  if (totalCo2e > 5) {
    lines.push("💡 **팁**: 오늘 탄소 배출이 높은 편이에요. 내일은 대중교통이나 채식 식사를 고려해보세요!");
  } else if (totalCo2e > 2) {
    lines.push("💡 **팁**: 괜찮은 하루예요! 작은 변화가 큰 차이를 만들어요.");
  } else {
    lines.push("🌱 **훌륭해요!** 환경을 위한 좋은 선택을 하셨네요!");
  }

  return lines.join("\n");
}

const CHAT_SUGGESTIONS: readonly string[] = Object.freeze([
  "오늘 택시로 5km 이동했어",
  "점심에 소고기 스테이크 먹었어",
  "커피 3잔 마셨어",
  "지하철로 10km 출퇴근했어",
  "에어컨 3시간 사용했어",
  "새 티셔츠 2벌 샀어",
  "자전거로 출근했어",
  "채식 점심 먹었어",
]);

export function getChatSuggestions(): string[] {
  return [...CHAT_SUGGESTIONS];
}

// ---- session --------------------------------------------------------------

export type ChatMessage = { role: "user" | "assistant"; content: string };

export type ChatSessionSummary = {
  action_count: number;
  total_co2e_kg: number;
  total_water_l: number;
  actions: Array<Pick<AnalyzedAction, "item" | "amount" | "category" | "co2e_kg" | "water_l">>;
};

/** Message history and analyzed actions of one interactive chat. */
export class ChatSession {
  history: ChatMessage[] = [];
  dailyActions: AnalyzedAction[] = [];

  addMessage(role: ChatMessage["role"], content: string) {
    this.history.push({ role, content });
  }

  addAction(action: AnalyzedAction) {
    this.dailyActions.push(action);
  }

  getDailySummary(): ChatSessionSummary {
    return {
      action_count: this.dailyActions.length,
      total_co2e_kg: this.dailyActions.reduce((acc, a) => acc + a.co2e_kg, 0),
      total_water_l: this.dailyActions.reduce((acc, a) => acc + a.water_l, 0),
      actions: this.dailyActions.map((a) => ({
        item: a.item,
        amount: a.amount,
        category: a.category,
        co2e_kg: a.co2e_kg,
        water_l: a.water_l,
      })),
    };
  }

  clear() {
    this.history = [];
    this.dailyActions = [];
  }
}
