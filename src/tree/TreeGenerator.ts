/**
 * TreeGenerator - Builds a random but plausible family tree
 *
 * Starts from a single home person born 1970-2000 and walks up the tree:
 * every person handed to addFamily() gets a freshly created father and
 * mother, a marriage, and a set of siblings. Parents then get their own
 * families with a probability that drops with each generation.
 *
 * Parents are always new people, so nobody can become their own ancestor.
 */

import { Faker, allLocales, en, base } from '@faker-js/faker';
import type { CountryBounds, LocaleCode } from '../utils/config.js';
import { AppError } from '../utils/ErrorHandler.js';
import { createLogger } from '../utils/logger.js';
import { ImageCatalog, type ImageFolder } from './ImageCatalog.js';
import {
  displayName,
  type EventType,
  type Family,
  type MediaObject,
  type Note,
  type NoteType,
  type Person,
  type Place,
  type PlaceType,
  type Sex,
  type Tree,
  type TreeDate,
  type TreeEvent
} from './types.js';

const logger = createLogger('TreeGenerator');

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

export const MAX_SIBLINGS = 9;
export const PROB_UNMARRIED = 0.05;
export const PROB_PERSON_HAS_NOTE = 0.5;
export const PROB_EVENT_HAS_NOTE = 0.5;
export const PROB_PERSON_RELOCATED = 0.2;
export const MIN_AGE = 55;
export const MAX_AGE = 90;
export const MIN_NOTE_LEN = 200;
export const MAX_NOTE_LEN = 2000;
export const NUM_PLACES = 50;
export const DEFAULT_GENERATIONS = 9;

const HOME_PERSON_MIN_YEAR = 1970;
const HOME_PERSON_MAX_YEAR = 2000;

/** Faces are in colour after this birth year and grayscale after the next */
const COLOR_FACE_AFTER = 1940;
const GRAYSCALE_FACE_AFTER = 1860;
/** Same thresholds for family and wedding pictures, by marriage year */
const COLOR_FAMILY_PICTURE_AFTER = 1950;
const GRAYSCALE_FAMILY_PICTURE_AFTER = 1880;

const PLACE_TYPES: readonly PlaceType[] = ['City', 'Hamlet', 'Locality', 'Municipality', 'Village', 'Town'];

// ═══════════════════════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export interface TreeGeneratorOptions {
  /** Faker locale for names and places */
  locale?: LocaleCode;
  /** Box that place coordinates are drawn from; the whole globe when omitted */
  bounds?: CountryBounds;
  /** Ancestor families stop after this many generations; each one is less likely */
  generations?: number;
  /** Fixed seed for a reproducible tree */
  seed?: number;
  /** Deaths in or after this year are not recorded */
  currentYear?: number;
  /** Images to attach; no media when omitted */
  catalog?: ImageCatalog;
  /** Directory media paths are relative to */
  mediaBasePath?: string;
  /** Change timestamp for every object, in seconds */
  changed?: number;
}

const ID_PREFIXES = {
  person: 'I',
  family: 'F',
  event: 'E',
  place: 'P',
  note: 'N',
  media: 'O'
} as const;

type ObjectKind = keyof typeof ID_PREFIXES;

// ═══════════════════════════════════════════════════════════════════════════════
// TREE GENERATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class TreeGenerator {
  private readonly faker: Faker;
  private readonly bounds?: CountryBounds;
  private readonly generations: number;
  private readonly currentYear: number;
  private readonly catalog: ImageCatalog;
  private readonly tree: Tree;
  private readonly counters: Record<ObjectKind, number> = {
    person: 0,
    family: 0,
    event: 0,
    place: 0,
    note: 0,
    media: 0
  };
  private placeList: Place[] = [];
  private built = false;

  /** Seed actually used, so a run can be reproduced */
  readonly seed: number;

  constructor(options: TreeGeneratorOptions = {}) {
    const locale = options.locale ?? 'de';
    this.faker = new Faker({ locale: [allLocales[locale], en, base] });
    this.seed = this.faker.seed(options.seed);

    this.bounds = options.bounds;
    this.generations = options.generations ?? DEFAULT_GENERATIONS;
    this.currentYear = options.currentYear ?? new Date().getFullYear();
    this.catalog = options.catalog ?? new ImageCatalog();

    this.tree = {
      homePersonHandle: '',
      mediaBasePath: options.mediaBasePath ?? process.cwd(),
      changed: options.changed ?? Math.floor(Date.now() / 1000),
      people: new Map(),
      families: new Map(),
      events: new Map(),
      places: new Map(),
      notes: new Map(),
      media: new Map()
    };

    logger.debug('TreeGenerator initialized', {
      locale,
      seed: this.seed,
      generations: this.generations,
      country: this.bounds?.code ?? 'any'
    });
  }

  /**
   * Generate the tree. A generator builds exactly one tree.
   */
  build(): Tree {
    if (this.built) {
      throw new AppError('TreeGenerator.build() may only be called once', false);
    }
    this.built = true;

    this.addPlaces();
    const home = this.addHomePerson();
    this.addFamily(home, 0);

    logger.info('Tree generated', {
      seed: this.seed,
      people: this.tree.people.size,
      families: this.tree.families.size,
      media: this.tree.media.size
    });

    return this.tree;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // RANDOM VALUES
  // ═══════════════════════════════════════════════════════════════════════════════

  private randomBool(probability: number): boolean {
    return this.faker.datatype.boolean({ probability });
  }

  private randomInt(min: number, max: number): number {
    return this.faker.number.int({ min, max });
  }

  private randomHandle(): string {
    return this.faker.string.uuid();
  }

  private randomSex(): Sex {
    return this.faker.helpers.arrayElement<Sex>(['M', 'F']);
  }

  private randomDate(year: number): TreeDate {
    const month = this.randomInt(1, 12);
    const daysInMonth = new Date(Date.UTC(2000, month, 0)).getUTCDate();
    const maxDay = month === 2 && !isLeapYear(year) ? 28 : daysInMonth;
    return { year, month, day: this.randomInt(1, maxDay) };
  }

  /**
   * Age at death, at least minAge (or MIN_AGE when not given)
   */
  private randomAge(minAge?: number): number {
    const lower = minAge ?? MIN_AGE;
    return this.randomInt(Math.min(lower, MAX_AGE), MAX_AGE);
  }

  private randomText(): string {
    const length = this.randomInt(MIN_NOTE_LEN, MAX_NOTE_LEN);
    let text = '';
    while (text.length < length) {
      text = text ? `${text} ${this.faker.lorem.paragraph()}` : this.faker.lorem.paragraph();
    }

    const cut = text.lastIndexOf(' ', length);
    return `${text.slice(0, cut > 0 ? cut : length).replace(/[.,;:!?]+$/, '')}.`;
  }

  private randomPlace(): Place | undefined {
    if (this.placeList.length === 0) {
      return undefined;
    }
    return this.faker.helpers.arrayElement(this.placeList);
  }

  private nextId(kind: ObjectKind): string {
    const id = `${ID_PREFIXES[kind]}${String(this.counters[kind]).padStart(4, '0')}`;
    this.counters[kind]++;
    return id;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // OBJECT CREATION
  // ═══════════════════════════════════════════════════════════════════════════════

  private addPlaces(): void {
    for (let i = 0; i < NUM_PLACES; i++) {
      const place: Place = {
        handle: this.randomHandle(),
        id: this.nextId('place'),
        name: this.faker.location.city(),
        type: this.faker.helpers.arrayElement(PLACE_TYPES),
        latitude: this.faker.location.latitude({
          min: this.bounds?.minLatitude ?? -90,
          max: this.bounds?.maxLatitude ?? 90,
          precision: 4
        }),
        longitude: this.faker.location.longitude({
          min: this.bounds?.minLongitude ?? -180,
          max: this.bounds?.maxLongitude ?? 180,
          precision: 4
        })
      };
      this.placeList.push(place);
      this.tree.places.set(place.handle, place);
    }
  }

  private createPerson(sex: Sex, surname?: string): Person {
    const person: Person = {
      handle: this.randomHandle(),
      id: this.nextId('person'),
      sex,
      firstName: this.faker.person.firstName(sex === 'M' ? 'male' : 'female'),
      surname: surname ?? this.faker.person.lastName(),
      birthHandle: '',
      noteHandles: [],
      mediaHandles: [],
      familyHandles: []
    };
    this.tree.people.set(person.handle, person);
    return person;
  }

  private addNote(type: NoteType): Note {
    const note: Note = {
      handle: this.randomHandle(),
      id: this.nextId('note'),
      type,
      text: this.randomText()
    };
    this.tree.notes.set(note.handle, note);
    return note;
  }

  private addEvent(type: EventType, year: number, description: string, placeHandle?: string): TreeEvent {
    const event: TreeEvent = {
      handle: this.randomHandle(),
      id: this.nextId('event'),
      type,
      date: this.randomDate(year),
      placeHandle,
      description,
      noteHandles: [],
      mediaHandles: []
    };
    if (this.randomBool(PROB_EVENT_HAS_NOTE)) {
      event.noteHandles.push(this.addNote('Event Note').handle);
    }
    this.tree.events.set(event.handle, event);
    return event;
  }

  private addBirth(person: Person, yearMin: number, yearMax: number, placeHandle?: string): void {
    const year = this.randomInt(yearMin, yearMax);
    const event = this.addEvent('Birth', year, `Birth of ${displayName(person)}`, placeHandle);
    person.birthHandle = event.handle;
  }

  private addDeath(person: Person, year: number, placeHandle?: string): void {
    const event = this.addEvent('Death', year, `Death of ${displayName(person)}`, placeHandle);
    person.deathHandle = event.handle;
  }

  private addPersonNote(person: Person): void {
    person.noteHandles.push(this.addNote('Person Note').handle);
  }

  /**
   * Attach the next free catalog image, if any, to the given media list
   */
  private addImage(target: { mediaHandles: string[] }, folder: ImageFolder, title: string, color: boolean): void {
    const image = this.catalog.take(folder, color);
    if (!image) {
      return;
    }

    const media: MediaObject = {
      handle: this.randomHandle(),
      id: this.nextId('media'),
      path: image.path,
      mime: 'image/jpeg',
      checksum: image.checksum,
      description: title
    };
    this.tree.media.set(media.handle, media);
    target.mediaHandles.push(media.handle);
  }

  private addFace(person: Person, birthYear: number): void {
    if (birthYear > COLOR_FACE_AFTER) {
      this.addImage(person, 'people', displayName(person), true);
    } else if (birthYear > GRAYSCALE_FACE_AFTER) {
      this.addImage(person, 'people', displayName(person), false);
    }
  }

  private birthEvent(person: Person): TreeEvent {
    const event = this.tree.events.get(person.birthHandle);
    if (!event) {
      throw new AppError(`Person ${person.id} has no birth event`, false);
    }
    return event;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TREE BUILDING
  // ═══════════════════════════════════════════════════════════════════════════════

  private addHomePerson(): Person {
    const person = this.createPerson(this.randomSex());
    this.addBirth(person, HOME_PERSON_MIN_YEAR, HOME_PERSON_MAX_YEAR, this.randomPlace()?.handle);
    this.addPersonNote(person);
    this.addImage(person, 'people', displayName(person), true);

    this.tree.homePersonHandle = person.handle;
    return person;
  }

  /**
   * Create a parent for the family: born 20-40 years before the child,
   * at the child's birth place unless relocated.
   */
  private addParent(family: Family, sex: Sex, childBirthYear: number, familyPlace?: string, surname?: string): Person {
    const parent = this.createPerson(sex, surname);
    parent.familyHandles.push(family.handle);

    const relocated = this.randomBool(PROB_PERSON_RELOCATED) ? this.randomPlace()?.handle : undefined;
    this.addBirth(parent, childBirthYear - 40, childBirthYear - 20, relocated ?? familyPlace);

    if (this.randomBool(PROB_PERSON_HAS_NOTE)) {
      this.addPersonNote(parent);
    }
    this.addFace(parent, this.birthEvent(parent).date.year);
    return parent;
  }

  /**
   * Add parents and siblings to an existing person, then recurse upwards
   */
  private addFamily(person: Person, generation: number): void {
    const birth = this.birthEvent(person);
    const birthYear = birth.date.year;
    const familyPlace = birth.placeHandle;

    const family: Family = {
      handle: this.randomHandle(),
      id: this.nextId('family'),
      relation: 'Unknown',
      childHandles: [person.handle],
      noteHandles: [],
      mediaHandles: []
    };
    this.tree.families.set(family.handle, family);
    person.parentFamilyHandle = family.handle;

    const father = this.addParent(family, 'M', birthYear, familyPlace, person.surname);
    const mother = this.addParent(family, 'F', birthYear, familyPlace);
    family.fatherHandle = father.handle;
    family.motherHandle = mother.handle;

    const fatherBirthYear = this.birthEvent(father).date.year;
    const motherBirthYear = this.birthEvent(mother).date.year;
    const couple = `${displayName(father)} & ${displayName(mother)}`;

    const marriageYear = this.randomInt(Math.max(fatherBirthYear, motherBirthYear) + 18, birthYear - 1);
    let marriage: TreeEvent | undefined;
    if (!this.randomBool(PROB_UNMARRIED)) {
      marriage = this.addEvent(
        'Marriage',
        marriageYear,
        `Marriage of ${displayName(father)} and ${displayName(mother)}`,
        familyPlace
      );
      family.marriageHandle = marriage.handle;
      family.relation = 'Married';
    }

    // Both parents outlive the birth of the child this family was built around
    const fatherDeathYear = fatherBirthYear + this.randomAge(birthYear - fatherBirthYear + 1);
    const motherDeathYear = motherBirthYear + this.randomAge(birthYear - motherBirthYear + 1);
    if (fatherDeathYear < this.currentYear) {
      this.addDeath(father, fatherDeathYear, familyPlace);
    }
    if (motherDeathYear < this.currentYear) {
      this.addDeath(mother, motherDeathYear, familyPlace);
    }

    if (marriageYear > COLOR_FAMILY_PICTURE_AFTER) {
      this.addImage(family, 'family', couple, true);
      if (marriage) this.addImage(marriage, 'wedding', couple, true);
    } else if (marriageYear > GRAYSCALE_FAMILY_PICTURE_AFTER) {
      // wedding pictures follow the family picture's colour mode
      this.addImage(family, 'family', couple, false);
      if (marriage) this.addImage(marriage, 'wedding', couple, false);
    }

    this.addSiblings(family, {
      surname: person.surname,
      place: familyPlace,
      firstChildBirthYear: birthYear,
      marriageYear,
      motherBirthYear,
      motherDeathYear,
      fatherDeathYear
    });

    if (generation < this.generations) {
      if (this.randomBool(1 - generation / this.generations)) {
        this.addFamily(father, generation + 1);
      }
      if (this.randomBool(1 - generation / this.generations)) {
        this.addFamily(mother, generation + 1);
      }
    }
  }

  private addSiblings(family: Family, context: {
    surname: string;
    place?: string;
    firstChildBirthYear: number;
    marriageYear: number;
    motherBirthYear: number;
    motherDeathYear: number;
    fatherDeathYear: number;
  }): void {
    const count = this.randomInt(0, MAX_SIBLINGS);
    let year = context.marriageYear + 1;

    for (let i = 0; i < count; i++) {
      year += this.randomInt(2, 6);
      // keep two years between siblings and the first child
      if (Math.abs(year - context.firstChildBirthYear) < 2) continue;
      if (year > context.motherBirthYear + 40) break;
      if (year > context.motherDeathYear - 2) break;
      if (year > context.fatherDeathYear - 1) break;
      if (year > this.currentYear) break;

      const child = this.createPerson(this.randomSex(), context.surname);
      child.parentFamilyHandle = family.handle;
      this.addBirth(child, year, year, context.place);

      const deathYear = year + this.randomAge();
      if (deathYear < this.currentYear) {
        const relocated = this.randomBool(PROB_PERSON_RELOCATED) ? this.randomPlace()?.handle : undefined;
        this.addDeath(child, deathYear, relocated ?? context.place);
      }
      if (this.randomBool(PROB_PERSON_HAS_NOTE)) {
        this.addPersonNote(child);
      }

      family.childHandles.push(child.handle);
    }

    family.childHandles.sort((a, b) => this.birthOrder(a) - this.birthOrder(b));
  }

  private birthOrder(personHandle: string): number {
    const person = this.tree.people.get(personHandle);
    if (!person) {
      return 0;
    }
    const { year, month, day } = this.birthEvent(person).date;
    return year * 10000 + month * 100 + day;
  }
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Generate one tree with a fresh generator
 */
export function generateTree(options: TreeGeneratorOptions = {}): Tree {
  return new TreeGenerator(options).build();
}

export default TreeGenerator;
