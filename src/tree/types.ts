/**
 * Tree Types - In-memory model of a generated family tree
 *
 * Mirrors the subset of the Gramps object model that the XML writer emits.
 * Objects reference each other by handle; Gramps ids (I0000, F0000, ...)
 * are the human-facing identifiers.
 */

export type Sex = 'M' | 'F';

export type EventType = 'Birth' | 'Death' | 'Marriage';

export type NoteType = 'Person Note' | 'Event Note';

export type PlaceType = 'City' | 'Hamlet' | 'Locality' | 'Municipality' | 'Village' | 'Town';

export type FamilyRelation = 'Married' | 'Unknown';

export interface TreeDate {
  year: number;
  month: number;
  day: number;
}

export interface Place {
  handle: string;
  id: string;
  name: string;
  type: PlaceType;
  latitude: number;
  longitude: number;
}

export interface Note {
  handle: string;
  id: string;
  type: NoteType;
  text: string;
}

export interface MediaObject {
  handle: string;
  id: string;
  /** Path relative to the tree's media base path */
  path: string;
  mime: string;
  /** MD5 of the file contents, as Gramps stores it */
  checksum: string;
  description: string;
}

export interface TreeEvent {
  handle: string;
  id: string;
  type: EventType;
  date: TreeDate;
  placeHandle?: string;
  description: string;
  noteHandles: string[];
  mediaHandles: string[];
}

export interface Person {
  handle: string;
  id: string;
  sex: Sex;
  firstName: string;
  surname: string;
  birthHandle: string;
  deathHandle?: string;
  noteHandles: string[];
  mediaHandles: string[];
  /** Family in which this person is a child */
  parentFamilyHandle?: string;
  /** Families in which this person is a parent */
  familyHandles: string[];
}

export interface Family {
  handle: string;
  id: string;
  relation: FamilyRelation;
  fatherHandle?: string;
  motherHandle?: string;
  childHandles: string[];
  marriageHandle?: string;
  noteHandles: string[];
  mediaHandles: string[];
}

export interface Tree {
  homePersonHandle: string;
  /** Absolute directory that media paths are relative to */
  mediaBasePath: string;
  /** Unix timestamp written as the change time of every object */
  changed: number;
  people: Map<string, Person>;
  families: Map<string, Family>;
  events: Map<string, TreeEvent>;
  places: Map<string, Place>;
  notes: Map<string, Note>;
  media: Map<string, MediaObject>;
}

export interface TreeStats {
  people: number;
  families: number;
  events: number;
  places: number;
  notes: number;
  media: number;
}

export function getTreeStats(tree: Tree): TreeStats {
  return {
    people: tree.people.size,
    families: tree.families.size,
    events: tree.events.size,
    places: tree.places.size,
    notes: tree.notes.size,
    media: tree.media.size
  };
}

/**
 * Name as Gramps displays it by default: "Surname, Given"
 */
export function displayName(person: Pick<Person, 'firstName' | 'surname'>): string {
  return `${person.surname}, ${person.firstName}`;
}
