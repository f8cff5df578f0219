/**
 * Method Registry
 *
 * Flattens the configured methods tree into callable entries keyed by
 * dotted path ("tools.call"). Entries validate their params before the
 * handler ever runs, so a bad call is rejected rather than failed.
 */

import { ZodError } from "zod";
import { ProtocolViolationError, formatIssues, type MethodDescriptor } from "@switchyard/shared";
import { isMethodDefinition } from "./types.js";
import type { CallContext, Method, MethodClass, MethodNamespace, MethodsConfig } from "./types.js";

export type MethodInvoker = (ctx: CallContext) => unknown;

export interface MethodInfo {
  name: string;
  mode?: MethodClass;
  description?: string;
  /** Validate params and return an invoker for them */
  bind(params: Record<string, unknown>): MethodInvoker;
}

export class MethodRegistry {
  private methods = new Map<string, MethodInfo>();

  constructor(methods: MethodsConfig = {}) {
    this.registerTree(methods, []);
  }

  /**
   * Register one method under a full path. Replaces any existing entry.
   */
  register(name: string, method: Method): void {
    this.methods.set(name, toMethodInfo(name, method));
  }

  unregister(name: string): boolean {
    return this.methods.delete(name);
  }

  /**
   * Get a method by name
   */
  get(name: string): MethodInfo | undefined {
    return this.methods.get(name);
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  /**
   * Get all method names
   */
  names(): string[] {
    return Array.from(this.methods.keys());
  }

  /** Public description of every method, sorted by name */
  describe(): MethodDescriptor[] {
    return Array.from(this.methods.values())
      .map(({ name, mode, description }) => {
        const descriptor: MethodDescriptor = { name };
        if (mode) descriptor.mode = mode;
        if (description) descriptor.description = description;
        return descriptor;
      })
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Classification hint from a method definition's `mode` */
  classify(name: string): MethodClass | undefined {
    return this.methods.get(name)?.mode;
  }

  /**
   * Resolve a method by name, or reject the call
   */
  resolve(name: string): MethodInfo {
    const info = this.methods.get(name);
    if (!info) {
      throw new ProtocolViolationError(`Unknown method "${name}"`);
    }
    return info;
  }

  get size(): number {
    return this.methods.size;
  }

  private registerTree(tree: MethodNamespace, path: string[]): void {
    for (const [key, value] of Object.entries(tree)) {
      const fullPath = [...path, key];
      if (typeof value === "function" || isMethodDefinition(value)) {
        this.register(fullPath.join("."), value);
      } else {
        this.registerTree(value, fullPath);
      }
    }
  }
}

function toMethodInfo(name: string, method: Method): MethodInfo {
  if (typeof method === "function") {
    return {
      name,
      bind: (params) => (ctx) => method(params, ctx),
    };
  }

  const { schema, mode, description } = method;
  return {
    name,
    mode,
    description,
    bind: (params) => {
      if (!schema) {
        return (ctx) => method.handler(params, ctx);
      }
      let validated: unknown;
      try {
        validated = schema.parse(params);
      } catch (error) {
        const issues = error instanceof ZodError ? formatIssues(error) : undefined;
        throw new ProtocolViolationError(
          `Invalid params for "${name}": ${error instanceof Error ? error.message : String(error)}`,
          issues,
        );
      }
      return (ctx) => method.handler(validated, ctx);
    },
  };
}
