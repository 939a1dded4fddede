/**
 * Turns a trigger event's flat (level, group-path) entry list into an
 * immutable tree of segment and group nodes. The composer and validator
 * interpret this tree instead of branching on message types.
 */

import { DefinitionError, definitionError } from '../errors/EngineErrors.js';
import { isValidSegmentCode } from '../model/Segment.js';
import { Result, fail, ok } from '../util/Result.js';
import type { Optionality, Repeatability, TriggerEvent, TriggerEventSegment } from './types.js';

export interface SegmentNode {
  readonly kind: 'segment';
  readonly code: string;
  readonly optionality: Optionality;
  readonly repeatability: Repeatability;
}

export interface GroupNode {
  readonly kind: 'group';
  readonly name: string;
  readonly optionality: Optionality;
  readonly repeatability: Repeatability;
  readonly children: readonly StructureNode[];
}

export type StructureNode = SegmentNode | GroupNode;

interface LevelParse {
  nodes: StructureNode[];
  next: number;
}

function samePath(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name.toUpperCase() === (b[i] ?? '').toUpperCase());
}

function describe(entry: TriggerEventSegment, index: number): string {
  return `entry ${index} (${entry.name})`;
}

export function buildStructureTree(event: TriggerEvent): Result<readonly StructureNode[], DefinitionError> {
  const entries = event.segments;
  if (entries.length === 0) {
    return fail(definitionError(event.code, 'Trigger event has no segments'));
  }

  const rootLevel = entries[0]?.level ?? 0;

  const parseLevel = (start: number, level: number, groupPath: string[]): Result<LevelParse, DefinitionError> => {
    const nodes: StructureNode[] = [];
    let index = start;

    while (index < entries.length) {
      const entry = entries[index];
      if (!entry || entry.level < level) break;

      if (entry.level > level) {
        return fail(
          definitionError(event.code, `${describe(entry, index)} jumps from level ${level} to ${entry.level}`)
        );
      }
      if (entry.groupPath.length > 0 && !samePath(entry.groupPath, groupPath)) {
        return fail(
          definitionError(
            event.code,
            `${describe(entry, index)} declares group path [${entry.groupPath.join(', ')}] ` +
              `but sits in [${groupPath.join(', ')}]`
          )
        );
      }

      if (entry.segmentCode === null) {
        const children = parseLevel(index + 1, level + 1, [...groupPath, entry.name]);
        if (!children.success) return children;
        if (children.value.nodes.length === 0) {
          return fail(
            definitionError(event.code, `Group ${entry.name} has no child entries at level ${level + 1}`)
          );
        }
        const group: GroupNode = {
          kind: 'group',
          name: entry.name,
          optionality: entry.optionality,
          repeatability: entry.repeatability,
          children: Object.freeze(children.value.nodes),
        };
        nodes.push(Object.freeze(group));
        index = children.value.next;
      } else {
        if (!isValidSegmentCode(entry.segmentCode)) {
          return fail(definitionError(event.code, `${describe(entry, index)} has an invalid segment code`));
        }
        const segment: SegmentNode = {
          kind: 'segment',
          code: entry.segmentCode,
          optionality: entry.optionality,
          repeatability: entry.repeatability,
        };
        nodes.push(Object.freeze(segment));
        index++;
      }
    }

    return ok({ nodes, next: index });
  };

  const parsed = parseLevel(0, rootLevel, []);
  if (!parsed.success) return parsed;

  const stray = entries[parsed.value.next];
  if (stray) {
    return fail(
      definitionError(
        event.code,
        `${describe(stray, parsed.value.next)} is at level ${stray.level}, above the root level ${rootLevel}`
      )
    );
  }
  return ok(Object.freeze(parsed.value.nodes));
}

/** Segment codes in tree order, groups flattened */
export function collectSegmentCodes(nodes: readonly StructureNode[]): string[] {
  return nodes.flatMap((node) => (node.kind === 'segment' ? [node.code] : collectSegmentCodes(node.children)));
}
