import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../cli/errors.js';
import { KeybindingFileSchema, type KeybindingFile } from '../schema/index.js';

export const FALLBACK_KEYS = 'abcdefghijklmnopqrstuvwxyz0123456789';

function isBindableKey(key: string): boolean {
  return key.length === 1 && key.trim() === key && key >= ' ' && key !== '\u007f';
}

type ContextMap = Map<string, Map<string, string>>;

function entry(map: ContextMap, context: string): Map<string, string> {
  let inner = map.get(context);
  if (!inner) {
    inner = new Map();
    map.set(context, inner);
  }
  return inner;
}

/**
 * Single-character shortcuts per context. Contexts are independent: the
 * same key may mean different things in "menu" and "item-editor". Within a
 * context a key maps to one value and a value to one key.
 *
 * Bindings read from the keys file are only remembered. They become
 * reachable once this run assigns the same value again; the rest are
 * written back on save until another value takes their key.
 */
export class KeybindingRegistry {
  // context -> key -> value, bound in this run
  private readonly byKey: ContextMap = new Map();
  // context -> value -> key, bound in this run
  private readonly byValue: ContextMap = new Map();
  // context -> key -> value, as loaded
  private readonly remembered: ContextMap = new Map();
  // context -> value -> key, as loaded
  private readonly rememberedByValue: ContextMap = new Map();

  static load(filePath: string): KeybindingRegistry {
    const registry = new KeybindingRegistry();
    if (!fs.existsSync(filePath)) {
      return registry;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConfigError('Invalid JSON in keybinding file', filePath);
      }
      throw error;
    }

    const parsed = KeybindingFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid keybinding file: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`, filePath);
    }
    for (const [context, keys] of Object.entries(parsed.data.contexts)) {
      const byValue = entry(registry.rememberedByValue, context);
      for (const [key, value] of Object.entries(keys)) {
        if (isBindableKey(key) && byValue.get(value) === undefined) {
          entry(registry.remembered, context).set(key, value);
          byValue.set(value, key);
        }
      }
    }
    return registry;
  }

  save(filePath: string): void {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(filePath, `${JSON.stringify(this.toJSON(), null, 2)}\n`, 'utf-8');
  }

  /** Bindings of this run plus remembered ones nothing has overwritten. */
  toJSON(): KeybindingFile {
    const contexts: KeybindingFile['contexts'] = {};
    for (const [context, keys] of this.byKey) {
      contexts[context] = Object.fromEntries(keys);
    }
    for (const [context, keys] of this.remembered) {
      for (const [key, value] of keys) {
        if (this.mapsTo(key, context) !== undefined || this.keyOf(value, context) !== undefined) continue;
        contexts[context] = { ...contexts[context], [key]: value };
      }
    }
    return { version: 1, contexts };
  }

  /**
   * Bind `value` to the first character of its own text that is still free.
   * Returns the key, or undefined when every character is taken.
   */
  autoAssign(value: string, context: string): string | undefined {
    return this.assign(value, context, [...value]);
  }

  /**
   * Bind `value` to `preferred` if free, else to the first free key of the
   * fallback alphabet.
   */
  bestEffortAssign(preferred: string, value: string, context: string): string | undefined {
    return this.assign(value, context, [preferred, ...FALLBACK_KEYS]);
  }

  mapsTo(key: string, context: string): string | undefined {
    return this.byKey.get(context)?.get(key);
  }

  keyOf(value: string, context: string): string | undefined {
    return this.byValue.get(context)?.get(value);
  }

  /** Bindings of a context sorted by key, for legends and pickers. */
  bindings(context: string): Array<{ key: string; value: string }> {
    const keys = this.byKey.get(context);
    if (!keys) return [];
    return [...keys.entries()]
      .map(([key, value]) => ({ key, value }))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  private assign(value: string, context: string, candidates: string[]): string | undefined {
    const existing = this.keyOf(value, context);
    if (existing !== undefined) return existing;

    const previous = this.rememberedByValue.get(context)?.get(value);
    if (previous !== undefined && this.mapsTo(previous, context) === undefined) {
      this.bind(previous, value, context);
      return previous;
    }

    const free = candidates.filter((key) => isBindableKey(key) && this.mapsTo(key, context) === undefined);
    // Keys remembered for other values are taken only when nothing else is left.
    const key = free.find((k) => this.remembered.get(context)?.get(k) === undefined) ?? free[0];
    if (key === undefined) return undefined;
    this.bind(key, value, context);
    return key;
  }

  private bind(key: string, value: string, context: string): void {
    entry(this.byKey, context).set(key, value);
    entry(this.byValue, context).set(value, key);
  }
}
