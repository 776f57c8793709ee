import type { Family, Person, Tree, TreeEvent } from "../../src/tree/types.js";

export function makePerson(handle: string, id: string, overrides: Partial<Person> = {}): Person {
  return {
    handle,
    id,
    sex: "M",
    firstName: "Given",
    surname: "Family",
    birthHandle: `${handle}-birth`,
    noteHandles: [],
    mediaHandles: [],
    familyHandles: [],
    ...overrides,
  };
}

export function makeBirth(person: Person, year: number, placeHandle?: string): TreeEvent {
  return {
    handle: person.birthHandle,
    id: `E${person.id.slice(1)}`,
    type: "Birth",
    date: { year, month: 1, day: 2 },
    placeHandle,
    description: `Birth of ${person.surname}, ${person.firstName}`,
    noteHandles: [],
    mediaHandles: [],
  };
}

/**
 * Father (p1), mother (p2) and their child (p0) in family f0, with one
 * place, one person note and one photo of the child.
 */
export function makeSampleTree(): Tree {
  const child = makePerson("p0", "I0000", {
    sex: "F",
    firstName: "Anna",
    surname: "Weber",
    parentFamilyHandle: "f0",
    noteHandles: ["n0"],
    mediaHandles: ["m0"],
  });
  const father = makePerson("p1", "I0001", { firstName: "Karl", surname: "Weber", familyHandles: ["f0"] });
  const mother = makePerson("p2", "I0002", { sex: "F", firstName: "Marie", surname: "Klein", familyHandles: ["f0"] });

  const family: Family = {
    handle: "f0",
    id: "F0000",
    relation: "Married",
    fatherHandle: "p1",
    motherHandle: "p2",
    childHandles: ["p0"],
    noteHandles: [],
    mediaHandles: [],
  };

  return {
    homePersonHandle: "p0",
    mediaBasePath: "/data",
    changed: 1700000000,
    people: new Map([
      [child.handle, child],
      [father.handle, father],
      [mother.handle, mother],
    ]),
    families: new Map([[family.handle, family]]),
    events: new Map([
      [child.birthHandle, makeBirth(child, 1985, "pl0")],
      [father.birthHandle, makeBirth(father, 1955)],
      [mother.birthHandle, makeBirth(mother, 1958)],
    ]),
    places: new Map([
      ["pl0", { handle: "pl0", id: "P0000", name: "Musterstadt", type: "Town", latitude: 52.52, longitude: 13.405 }],
    ]),
    notes: new Map([
      ["n0", { handle: "n0", id: "N0000", type: "Person Note", text: "Tom & Jerry <3 \"quoted\"" }],
    ]),
    media: new Map([
      [
        "m0",
        {
          handle: "m0",
          id: "O0000",
          path: "images/people/color/00001.jpg",
          mime: "image/jpeg",
          checksum: "0cc175b9c0f1b6a831c399e269772661",
          description: "Weber, Anna",
        },
      ],
    ]),
  };
}
