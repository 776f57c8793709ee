import { ValidationError } from '../utils/ErrorHandler.js';
import type { Tree } from './types.js';

/**
 * List every structural problem in a tree; empty when the tree is consistent.
 *
 * Checks referential integrity, one parent family per child, unique Gramps
 * ids, and that nobody is their own ancestor. A family has a father and a
 * mother slot, so it never holds more than two parents.
 */
export function validateTree(tree: Tree): string[] {
  const problems: string[] = [];

  if (!tree.people.has(tree.homePersonHandle)) {
    problems.push(`Home person ${tree.homePersonHandle} does not exist`);
  }

  const checkRefs = (owner: string, kind: string, handles: Iterable<string | undefined>, target: Map<string, unknown>) => {
    for (const handle of handles) {
      if (handle !== undefined && !target.has(handle)) {
        problems.push(`${owner} references missing ${kind} ${handle}`);
      }
    }
  };

  for (const person of tree.people.values()) {
    const owner = `Person ${person.id}`;
    checkRefs(owner, 'event', [person.birthHandle, person.deathHandle], tree.events);
    checkRefs(owner, 'note', person.noteHandles, tree.notes);
    checkRefs(owner, 'media', person.mediaHandles, tree.media);
    checkRefs(owner, 'family', [person.parentFamilyHandle, ...person.familyHandles], tree.families);

    if (person.parentFamilyHandle !== undefined) {
      const family = tree.families.get(person.parentFamilyHandle);
      if (family && !family.childHandles.includes(person.handle)) {
        problems.push(`${owner} claims family ${family.id} which does not list them as a child`);
      }
    }
    for (const familyHandle of person.familyHandles) {
      const family = tree.families.get(familyHandle);
      if (family && family.fatherHandle !== person.handle && family.motherHandle !== person.handle) {
        problems.push(`${owner} claims family ${family.id} which does not list them as a parent`);
      }
    }
  }

  const childOf = new Map<string, string>();

  for (const family of tree.families.values()) {
    const owner = `Family ${family.id}`;
    const parents = [family.fatherHandle, family.motherHandle].filter((h): h is string => h !== undefined);

    checkRefs(owner, 'person', [...parents, ...family.childHandles], tree.people);
    checkRefs(owner, 'event', [family.marriageHandle], tree.events);
    checkRefs(owner, 'note', family.noteHandles, tree.notes);
    checkRefs(owner, 'media', family.mediaHandles, tree.media);

    for (const childHandle of family.childHandles) {
      const previous = childOf.get(childHandle);
      if (previous !== undefined) {
        problems.push(`Person ${childHandle} is a child in both ${previous} and ${family.id}`);
      }
      childOf.set(childHandle, family.id);

      if (parents.includes(childHandle)) {
        problems.push(`${owner} lists person ${childHandle} as both parent and child`);
      }
    }
  }

  for (const event of tree.events.values()) {
    const owner = `Event ${event.id}`;
    checkRefs(owner, 'place', [event.placeHandle], tree.places);
    checkRefs(owner, 'note', event.noteHandles, tree.notes);
    checkRefs(owner, 'media', event.mediaHandles, tree.media);
  }

  const ids = new Set<string>();
  const allObjects = [
    ...tree.people.values(), ...tree.families.values(), ...tree.events.values(),
    ...tree.places.values(), ...tree.notes.values(), ...tree.media.values()
  ];
  for (const object of allObjects) {
    if (ids.has(object.id)) {
      problems.push(`Duplicate id ${object.id}`);
    }
    ids.add(object.id);
  }

  for (const cycleMember of findAncestorCycles(tree)) {
    problems.push(`Person ${cycleMember} is their own ancestor`);
  }

  return problems;
}

/**
 * Throw a ValidationError listing every problem found by validateTree()
 */
export function assertValidTree(tree: Tree): void {
  const problems = validateTree(tree);
  if (problems.length > 0) {
    throw new ValidationError(`Generated tree is inconsistent (${problems.length} problems)`, problems);
  }
}

/**
 * Depth-first walk over child -> parent edges; returns one person per cycle found
 */
function findAncestorCycles(tree: Tree): string[] {
  const parentsOf = (handle: string): string[] => {
    const familyHandle = tree.people.get(handle)?.parentFamilyHandle;
    const family = familyHandle === undefined ? undefined : tree.families.get(familyHandle);
    if (!family) return [];
    return [family.fatherHandle, family.motherHandle].filter((h): h is string => h !== undefined);
  };

  const state = new Map<string, 'visiting' | 'done'>();
  const cycles: string[] = [];

  for (const start of tree.people.keys()) {
    if (state.has(start)) continue;

    // iterative DFS
    const stack: Array<{ handle: string; parents: string[]; next: number }> = [
      { handle: start, parents: parentsOf(start), next: 0 }
    ];
    state.set(start, 'visiting');

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.parents.length) {
        state.set(frame.handle, 'done');
        stack.pop();
        continue;
      }

      const parent = frame.parents[frame.next++];
      const parentState = state.get(parent);
      if (parentState === 'visiting') {
        const person = tree.people.get(parent);
        cycles.push(person ? person.id : parent);
      } else if (parentState === undefined && tree.people.has(parent)) {
        state.set(parent, 'visiting');
        stack.push({ handle: parent, parents: parentsOf(parent), next: 0 });
      }
    }
  }

  return cycles;
}
