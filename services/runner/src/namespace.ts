/**
 * Submission namespace: one vm context holding everything a submission defines.
 * Callers only reach it through execute/lookup/snapshot; the context itself never leaves this module.
 */

import * as vm from "node:vm";
import { types } from "node:util";
import assert from "node:assert";
import type { ContextScope } from "../../../packages/shared/src/types";
import { RESERVED_PREFIX, RUNNER_CONFIG } from "./config";

const IDENTIFIER_RE = /^[A-Za-z_$][\w$]*$/;

export interface NamespaceScope {
  /** Run one statement inside the scope. Throws whatever the code throws. */
  execute(code: string, timeoutMs: number): unknown;
  dispose(): void;
}

export interface ErrorDescription {
  kind: string;
  message: string;
}

export const UNPRINTABLE_THROWN_VALUE = "<unprintable thrown value>";

/**
 * Read a data property from a thrown value without running any of its code:
 * getters, proxies and toString overrides belong to the submission and may throw or never return.
 */
function isObjectLike(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

function readDataProperty(value: unknown, key: string): unknown {
  if (!isObjectLike(value)) return undefined;
  try {
    if (types.isProxy(value)) return undefined;
    let current: object | null = value;
    while (current !== null) {
      const descriptor = Object.getOwnPropertyDescriptor(current, key);
      if (descriptor) return "value" in descriptor ? descriptor.value : undefined;
      current = Object.getPrototypeOf(current);
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * Errors thrown inside the context come from another realm, so `instanceof Error`
 * is false for them; read name/message structurally instead. Never throws.
 */
export function describeError(err: unknown): ErrorDescription {
  const name = readDataProperty(err, "name");
  const kind = typeof name === "string" && name ? name : "Error";
  const message = readDataProperty(err, "message");
  if (typeof message === "string") return { kind, message: sanitizeMessage(message) };
  if (isObjectLike(err)) return { kind, message: UNPRINTABLE_THROWN_VALUE };
  return { kind, message: sanitizeMessage(String(err)) };
}

export function sanitizeMessage(msg: string): string {
  return msg.replace(/\s+/g, " ").trim().slice(0, RUNNER_CONFIG.MAX_ERROR_CHARS);
}

export function isTimeoutError(err: unknown): boolean {
  return readDataProperty(err, "code") === "ERR_SCRIPT_EXECUTION_TIMEOUT";
}

export function isAssertionFailure(err: unknown): boolean {
  if (readDataProperty(err, "code") !== "ERR_ASSERTION") return false;
  try {
    return err instanceof assert.AssertionError;
  } catch {
    return false;
  }
}

/** True when `source` parses as a script. Nothing is executed. */
export function isParsable(source: string): boolean {
  try {
    new vm.Script(source);
    return true;
  } catch {
    return false;
  }
}

function toVmTimeout(timeoutMs: number): number {
  return Math.max(1, Math.ceil(timeoutMs));
}

export class Namespace {
  private readonly context: vm.Context;
  private readonly seeded: ReadonlySet<string>;
  private scopeSeq = 0;

  constructor(seed: Record<string, unknown> = {}) {
    this.seeded = new Set(Object.keys(seed));
    this.context = vm.createContext({ ...seed }, { name: "submission", microtaskMode: "afterEvaluate" });
  }

  execute(code: string, timeoutMs: number): unknown {
    const script = new vm.Script(code, { filename: "submission.js" });
    return script.runInContext(this.context, { timeout: toVmTimeout(timeoutMs), displayErrors: false });
  }

  /**
   * Read a binding by name, including top-level let/const/class bindings that
   * never appear on the global object. Undefined when the name is not bound.
   */
  lookup(name: string): unknown {
    if (!IDENTIFIER_RE.test(name)) return undefined;
    try {
      return this.execute(`typeof ${name} === "undefined" ? undefined : ${name}`, RUNNER_CONFIG.LOOKUP_TIMEOUT_MS);
    } catch {
      // A binding still in its temporal dead zone reads as unbound.
      return undefined;
    }
  }

  /** Global bindings with reserved and seeded entries filtered out. */
  snapshot(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(this.context)) {
      if (key.startsWith(RESERVED_PREFIX) || this.seeded.has(key)) continue;
      out[key] = this.context[key];
    }
    return out;
  }

  /**
   * Run `contextCode` and return a scope in which statements see its bindings.
   * "question" keeps the context's declarations private to the scope;
   * "shared" runs it at top level so later questions see what it defined.
   */
  openScope(contextCode: string, timeoutMs: number, mode: ContextScope): NamespaceScope {
    if (mode === "shared") {
      if (contextCode.trim()) this.execute(contextCode, timeoutMs);
      return {
        execute: (code, limitMs) => this.execute(code, limitMs),
        dispose: () => undefined
      };
    }

    const slot = `${RESERVED_PREFIX}scope_${++this.scopeSeq}`;
    this.execute(
      `globalThis.${slot} = (function () {\n${contextCode}\nreturn function (${RESERVED_PREFIX}source) { return eval(${RESERVED_PREFIX}source); };\n})();`,
      timeoutMs
    );
    return {
      execute: (code, limitMs) => this.execute(`${slot}(${JSON.stringify(code)})`, limitMs),
      dispose: () => {
        this.execute(`delete globalThis.${slot}`, RUNNER_CONFIG.LOOKUP_TIMEOUT_MS);
      }
    };
  }
}
