/**
 * GrampsXmlWriter - Serializes a Tree as Gramps XML
 *
 * The document layout lives in templates/gramps.xml.hbs; this module turns
 * the tree into a flat view model (prefixed handles, formatted dates) and
 * lets Handlebars escape every value.
 */

import fs from 'fs/promises';
import path from 'path';
import { promisify } from 'util';
import { gzip } from 'zlib';
import Handlebars from 'handlebars';
import { createLogger } from '../utils/logger.js';
import { resolveProjectFile } from '../utils/paths.js';
import type { Tree, TreeDate } from './types.js';

const logger = createLogger('GrampsXmlWriter');
const gzipAsync = promisify(gzip);

type HandlebarsTemplateDelegate = ReturnType<typeof Handlebars.compile>;

export const GRAMPS_VERSION = '5.2.0';

export interface WriteOptions {
  /** Gzip the output, as Gramps does for its own .gramps exports */
  compress?: boolean;
  /** Date written to the header, defaults to today */
  created?: Date;
}

export interface WriteResult {
  path: string;
  sizeBytes: number;
  compressed: boolean;
}

/**
 * Gramps writes handles with a leading underscore
 */
function hlink(handle: string): string {
  return `_${handle}`;
}

export function formatDate(date: TreeDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export class GrampsXmlWriter {
  private templatePath: string;
  private template: HandlebarsTemplateDelegate | null = null;

  constructor(templatePath?: string) {
    this.templatePath = templatePath ?? resolveProjectFile('templates/gramps.xml.hbs');
  }

  /**
   * Load and compile the template; later calls reuse it
   */
  async load(): Promise<HandlebarsTemplateDelegate> {
    if (this.template) {
      return this.template;
    }

    const source = await fs.readFile(this.templatePath, 'utf8');
    this.template = Handlebars.create().compile(source);
    logger.debug('Gramps XML template compiled', { templatePath: this.templatePath });
    return this.template;
  }

  /**
   * Render the tree as an XML string
   */
  async render(tree: Tree, created: Date = new Date()): Promise<string> {
    const template = await this.load();
    return template(this.buildView(tree, created));
  }

  /**
   * Render the tree and write it to outputPath
   */
  async write(tree: Tree, outputPath: string, options: WriteOptions = {}): Promise<WriteResult> {
    const xml = await this.render(tree, options.created);
    const compressed = options.compress ?? false;
    const contents = compressed ? await gzipAsync(xml) : Buffer.from(xml, 'utf8');
    const absolutePath = path.resolve(outputPath);

    await fs.writeFile(absolutePath, contents);

    logger.info('Gramps XML written', {
      path: absolutePath,
      sizeBytes: contents.length,
      compressed
    });

    return { path: absolutePath, sizeBytes: contents.length, compressed };
  }

  private buildView(tree: Tree, created: Date) {
    const change = String(tree.changed);

    return {
      created: created.toISOString().split('T')[0],
      version: GRAMPS_VERSION,
      mediaPath: tree.mediaBasePath,
      home: hlink(tree.homePersonHandle),

      events: [...tree.events.values()].map((event) => ({
        handle: hlink(event.handle),
        change,
        id: event.id,
        type: event.type,
        date: formatDate(event.date),
        place: event.placeHandle === undefined ? undefined : hlink(event.placeHandle),
        description: event.description,
        notes: event.noteHandles.map(hlink),
        media: event.mediaHandles.map(hlink)
      })),

      people: [...tree.people.values()].map((person) => ({
        handle: hlink(person.handle),
        change,
        id: person.id,
        gender: person.sex,
        first: person.firstName,
        surname: person.surname,
        events: [person.birthHandle, person.deathHandle]
          .filter((handle): handle is string => handle !== undefined)
          .map(hlink),
        media: person.mediaHandles.map(hlink),
        childof: person.parentFamilyHandle === undefined ? undefined : hlink(person.parentFamilyHandle),
        parentin: person.familyHandles.map(hlink),
        notes: person.noteHandles.map(hlink)
      })),

      families: [...tree.families.values()].map((family) => ({
        handle: hlink(family.handle),
        change,
        id: family.id,
        relation: family.relation,
        father: family.fatherHandle === undefined ? undefined : hlink(family.fatherHandle),
        mother: family.motherHandle === undefined ? undefined : hlink(family.motherHandle),
        marriage: family.marriageHandle === undefined ? undefined : hlink(family.marriageHandle),
        media: family.mediaHandles.map(hlink),
        children: family.childHandles.map(hlink),
        notes: family.noteHandles.map(hlink)
      })),

      places: [...tree.places.values()].map((place) => ({
        handle: hlink(place.handle),
        change,
        id: place.id,
        type: place.type,
        name: place.name,
        latitude: String(place.latitude),
        longitude: String(place.longitude)
      })),

      objects: [...tree.media.values()].map((media) => ({
        handle: hlink(media.handle),
        change,
        id: media.id,
        path: media.path,
        mime: media.mime,
        checksum: media.checksum,
        description: media.description
      })),

      notes: [...tree.notes.values()].map((note) => ({
        handle: hlink(note.handle),
        change,
        id: note.id,
        type: note.type,
        text: note.text
      }))
    };
  }
}

export default GrampsXmlWriter;
