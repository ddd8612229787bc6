// src/actionLog.ts
import { z } from "zod";
import { ACTION_CATEGORIES, FactorNotFoundError } from "./factorRepository";
import { buildActionRecord, TIMES_OF_DAY } from "./impactEngine";
import type { ActionRecord, TimeOfDay } from "./impactEngine";
import type { ActionStore, StoredAction } from "./actionStore";
import { generateResponse, parseMessage } from "./chatbot";
import type { AnalyzedAction, ParsedAction } from "./chatbot";
import { isIsoDate } from "./dates";

export const EMPTY_MESSAGE_RESPONSE = "메시지를 입력해주세요.";

const optionalText = z
  .string()
  .nullish()
  .transform((v) => {
    const t = (v ?? "").trim();
    return t ? t : null;
  });

export const ActionLogInputSchema = z.object({
  category: z.enum(ACTION_CATEGORIES),
  item: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.string().min(1, "item is required")),
  amount: z.coerce.number().finite().positive(),
  subcategory: optionalText,
  time_of_day: z
    .enum(TIMES_OF_DAY)
    .nullish()
    .transform((v): TimeOfDay => v ?? "standard"),
  location: optionalText,
  notes: z.string().max(500).nullish().transform((v) => v ?? null),
});

export type ActionLogInput = z.input<typeof ActionLogInputSchema>;
export type ValidActionLogInput = z.output<typeof ActionLogInputSchema>;

export class InvalidActionError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid action: ${issues.join("; ")}`);
    this.name = "InvalidActionError";
    this.issues = issues;
  }
}

export function validateActionInput(input: unknown): ValidActionLogInput {
  const parsed = ActionLogInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidActionError(
      parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }
  return parsed.data;
}

/**
 * Validate, compute the footprint and persist one action on `date`.
 *
 * @throws InvalidActionError when the input does not validate
 * @throws FactorNotFoundError when no factor exists for the item
 */
export async function logAction(store: ActionStore, input: unknown, date: string): Promise<StoredAction> {
  const valid = validateActionInput(input);
  const record = buildActionRecord(valid);

  return store.insert({
    ...record,
    date,
    location: valid.location,
    notes: valid.notes,
  });
}

export type BulkLogFailure = { index: number; reason: string };

export type BulkLogResult = {
  logged: StoredAction[];
  skipped: BulkLogFailure[];
};

/**
 * Log each entry in order. Entries that fail validation or have no factor are
 * skipped and reported; storage errors still abort the run.
 */
export async function logActionsBulk(
  store: ActionStore,
  inputs: readonly unknown[],
  date: string
): Promise<BulkLogResult> {
  const logged: StoredAction[] = [];
  const skipped: BulkLogFailure[] = [];

  for (const [index, input] of inputs.entries()) {
    try {
      logged.push(await logAction(store, input, date));
    } catch (e: unknown) {
      if (e instanceof InvalidActionError || e instanceof FactorNotFoundError) {
        skipped.push({ index, reason: e.message });
        continue;
      }
      throw e;
    }
  }

  return { logged, skipped };
}

function recordForParsedAction(action: ParsedAction): ActionRecord | null {
  if (!(action.amount > 0)) return null;
  try {
    return buildActionRecord({ category: action.category, item: action.item, amount: action.amount });
  } catch (e: unknown) {
    if (e instanceof FactorNotFoundError) return null;
    throw e;
  }
}

export type ChatLogResult = {
  response: string;
  actions: Array<Pick<ParsedAction, "category" | "item" | "amount" | "confidence">>;
  impacts: Array<Pick<StoredAction, "id" | "item" | "amount" | "co2e_kg" | "water_l">>;
  // parsed action and its footprint, one per logged record
  analyzed: AnalyzedAction[];
};

/**
 * Parse a chat message, log every action it names and build the reply.
 * Actions whose item has no factor, or whose amount is not positive ("0km"),
 * are left out of the log and the reply.
 */
export async function logChatMessage(store: ActionStore, message: string, date: string): Promise<ChatLogResult> {
  if (!message.trim()) {
    return { response: EMPTY_MESSAGE_RESPONSE, actions: [], impacts: [], analyzed: [] };
  }

  const result: ChatLogResult = { response: "", actions: [], impacts: [], analyzed: [] };

  for (const action of parseMessage(message)) {
    const record = recordForParsedAction(action);
    if (!record) continue;

    const saved = await store.insert({ ...record, date });

    result.analyzed.push({ ...action, co2e_kg: saved.co2e_kg, water_l: saved.water_l });
    result.actions.push({
      category: action.category,
      item: action.item,
      amount: action.amount,
      confidence: action.confidence,
    });
    result.impacts.push({
      id: saved.id,
      item: saved.item,
      amount: saved.amount,
      co2e_kg: saved.co2e_kg,
      water_l: saved.water_l,
    });
  }

  result.response = generateResponse(result.analyzed);
  return result;
}

export class ActionNotFoundError extends Error {
  constructor(readonly id: number) {
    super(`Action not found: id=${id}`);
    this.name = "ActionNotFoundError";
  }
}

export type ActionQuery = { date: string } | { from: string; to: string };

/** One day, or an inclusive range, of logged actions in store order. */
export async function listActions(store: ActionStore, query: ActionQuery): Promise<StoredAction[]> {
  if ("date" in query) {
    if (!isIsoDate(query.date)) throw new Error(`Invalid date '${query.date}', expected YYYY-MM-DD`);
    return store.listByDate(query.date);
  }

  for (const d of [query.from, query.to]) {
    if (!isIsoDate(d)) throw new Error(`Invalid date '${d}', expected YYYY-MM-DD`);
  }
  if (query.from > query.to) throw new Error(`Invalid range: ${query.from} is after ${query.to}`);
  return store.listByDateRange(query.from, query.to);
}

/**
 * Remove one logged action. A correction is a delete followed by a new log.
 *
 * @throws ActionNotFoundError when no row has this id
 */
export async function deleteAction(store: ActionStore, id: number): Promise<void> {
  if (!Number.isInteger(id) || id <= 0) throw new Error(`Invalid action id: ${id}`);
  if (!(await store.delete(id))) throw new ActionNotFoundError(id);
}
