import { config as dotenvConfig } from 'dotenv';
import { readFile } from 'fs/promises';
import { allLocales } from '@faker-js/faker';
import { ConfigurationError } from './ErrorHandler.js';
import { resolveProjectFile } from './paths.js';
import logger from './logger.js';

// Load environment variables
dotenvConfig();

export type Env = Record<string, string | undefined>;

export type LocaleCode = keyof typeof allLocales;

/**
 * Latitude/longitude box that generated places are drawn from
 */
export interface CountryBounds {
    code: string;
    name: string;
    minLatitude: number;
    maxLatitude: number;
    minLongitude: number;
    maxLongitude: number;
}

/**
 * Tree generator configuration
 */
export interface TreeConfig {
    outputPath: string;
    locale: LocaleCode;
    countryCode: string;
    generations: number;
    /** Undefined means a fresh random seed per run */
    seed?: number;
    compress: boolean;
    imagesDir: string;
}

/**
 * Face fetcher configuration
 */
export interface FaceConfig {
    url: string;
    outputDir: string;
    maxAttempts: number;
    userAgent: string;
}

/**
 * Stock photo configuration
 */
export interface PhotoConfig {
    apiUrl: string;
    apiKey: string;
    imagesDir: string;
    userAgent: string;
}

const DEFAULT_USER_AGENT = 'random-tree-faker/1.0';

export function isLocaleCode(code: string): code is LocaleCode {
    return Object.prototype.hasOwnProperty.call(allLocales, code);
}

function readString(env: Env, key: string, defaultValue: string): string {
    const value = env[key]?.trim();
    return value ? value : defaultValue;
}

function readInteger(env: Env, key: string, defaultValue: number, min: number): number {
    const raw = env[key]?.trim();
    if (!raw) {
        return defaultValue;
    }

    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new ConfigurationError(key, `must be an integer, got "${raw}"`);
    }
    if (value < min) {
        throw new ConfigurationError(key, `must be at least ${min}, got ${value}`);
    }
    return value;
}

function readBoolean(env: Env, key: string, defaultValue: boolean): boolean {
    const raw = env[key]?.trim().toLowerCase();
    if (!raw) {
        return defaultValue;
    }
    if (raw === 'true' || raw === '1' || raw === 'yes') return true;
    if (raw === 'false' || raw === '0' || raw === 'no') return false;
    throw new ConfigurationError(key, `must be true or false, got "${raw}"`);
}

function readUrl(env: Env, key: string, defaultValue: string): string {
    const value = readString(env, key, defaultValue);
    try {
        new URL(value);
    } catch {
        throw new ConfigurationError(key, `must be a valid URL, got "${value}"`);
    }
    return value;
}

/**
 * Build the tree generator configuration from the environment
 */
export function loadTreeConfig(env: Env = process.env): TreeConfig {
    const locale = readString(env, 'TREE_LOCALE', 'de');
    if (!isLocaleCode(locale)) {
        throw new ConfigurationError('TREE_LOCALE', `unknown locale "${locale}"`);
    }

    const seedRaw = env.TREE_SEED?.trim();

    const config: TreeConfig = {
        outputPath: readString(env, 'TREE_OUTPUT', 'random_tree.gramps'),
        locale,
        countryCode: readString(env, 'TREE_COUNTRY', 'DE').toUpperCase(),
        generations: readInteger(env, 'TREE_GENERATIONS', 9, 1),
        seed: seedRaw ? readInteger(env, 'TREE_SEED', 0, 0) : undefined,
        compress: readBoolean(env, 'TREE_COMPRESS', false),
        imagesDir: readString(env, 'IMAGES_DIR', 'images')
    };

    logger.debug('Tree configuration loaded', { ...config });
    return config;
}

/**
 * Build the face fetcher configuration from the environment
 */
export function loadFaceConfig(env: Env = process.env): FaceConfig {
    return {
        url: readUrl(env, 'FACES_URL', 'https://thispersondoesnotexist.com'),
        outputDir: readString(env, 'FACES_DIR', 'images/people'),
        maxAttempts: readInteger(env, 'FACES_MAX_ATTEMPTS', 1, 1),
        userAgent: readString(env, 'HTTP_USER_AGENT', DEFAULT_USER_AGENT)
    };
}

/**
 * Build the stock photo configuration from the environment.
 * The Pexels API key has no default.
 */
export function loadPhotoConfig(env: Env = process.env): PhotoConfig {
    const apiKey = env.PEXELS_API_KEY?.trim();
    if (!apiKey) {
        throw new ConfigurationError(
            'PEXELS_API_KEY',
            'the Pexels API key must be provided in the PEXELS_API_KEY environment variable'
        );
    }

    return {
        apiUrl: readUrl(env, 'PEXELS_API_URL', 'https://api.pexels.com/v1/search'),
        apiKey,
        imagesDir: readString(env, 'IMAGES_DIR', 'images'),
        userAgent: readString(env, 'HTTP_USER_AGENT', DEFAULT_USER_AGENT)
    };
}

interface CountryEntry {
    name: string;
    minLatitude: number;
    maxLatitude: number;
    minLongitude: number;
    maxLongitude: number;
}

function isCountryEntry(value: unknown): value is CountryEntry {
    if (typeof value !== 'object' || value === null) return false;
    const entry: Record<string, unknown> = { ...value };
    return typeof entry.name === 'string'
        && typeof entry.minLatitude === 'number'
        && typeof entry.maxLatitude === 'number'
        && typeof entry.minLongitude === 'number'
        && typeof entry.maxLongitude === 'number';
}

/**
 * Look up a country's bounding box in data/countries.json
 */
export async function loadCountryBounds(countryCode: string): Promise<CountryBounds> {
    const filePath = resolveProjectFile('data/countries.json');
    const parsed: unknown = JSON.parse(await readFile(filePath, 'utf8'));

    if (typeof parsed !== 'object' || parsed === null) {
        throw new ConfigurationError('TREE_COUNTRY', `${filePath} is not a JSON object`);
    }

    const countries: Record<string, unknown> = { ...parsed };
    const entry = countries[countryCode];
    if (!isCountryEntry(entry)) {
        throw new ConfigurationError(
            'TREE_COUNTRY',
            `unknown country "${countryCode}", expected one of ${Object.keys(countries).join(', ')}`
        );
    }

    return { code: countryCode, ...entry };
}
