import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import { stableStringify } from '../util/deterministicJson';
import type { NodeHandle, OrchestrationModel, ShapeNode } from './orchestration';
import { ShapeArena } from './shapeArena';

export const MODEL_SCHEMA = 'orchestration-model-v1';

/** Header fields replaced by nesting in the serialized form. */
const LINK_FIELDS: ReadonlySet<string> = new Set(['handle', 'parent', 'children']);

export type JsonShape = Record<string, unknown>;

function nested(arena: ShapeArena, handles: readonly NodeHandle[]): JsonShape[] {
  return handles.map((h) => shapeToJson(arena, arena.get(h)));
}

/** A node with every handle list (children, branches, cases) expanded into nested nodes. */
export function shapeToJson(arena: ShapeArena, node: ShapeNode): JsonShape {
  const out: JsonShape = Object.fromEntries(Object.entries(node).filter(([k]) => !LINK_FIELDS.has(k)));
  out.children = nested(arena, node.children);
  switch (node.kind) {
    case 'decide':
      out.trueBranch = nested(arena, node.trueBranch);
      out.falseBranch = nested(arena, node.falseBranch);
      break;
    case 'switch':
      out.cases = node.cases.map((c) => ({ key: c.key, nodes: nested(arena, c.nodes) }));
      out.defaultCase = nested(arena, node.defaultCase);
      break;
    case 'listen':
      out.branches = node.branches.map((b) => ({ name: b.name, oid: b.oid, nodes: nested(arena, b.nodes) }));
      break;
    default:
      break;
  }
  return out;
}

export function modelToJson(model: OrchestrationModel): Record<string, unknown> {
  return {
    schema: MODEL_SCHEMA,
    namespace: model.namespace,
    name: model.name,
    fullName: model.fullName,
    messages: model.messages,
    portTypes: model.portTypes,
    ports: model.ports,
    declarations: nested(model.arena, model.declarations),
    nodes: nested(model.arena, model.nodes),
  };
}

/**
 * Serialize a parsed orchestration to a deterministic JSON string.
 */
export function serializeModel(model: OrchestrationModel, space = 2): string {
  return stableStringify(modelToJson(model), space);
}

export async function writeModelJsonFile(filePath: string, model: OrchestrationModel): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeModel(model), 'utf8');
}
