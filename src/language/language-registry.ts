/**
 * Language profile registry.
 *
 * Profiles are plain data (profiles.json). The registry validates them once,
 * compiles their patterns and is then passed explicitly to every extractor call.
 */

import * as path from 'path';
import { z } from 'zod';
import profileData from './profiles.json';
import { GraphError } from '../errors';

export type BlockStyle = 'brace' | 'indent';

/**
 * Control keywords recognised by the pattern-based statement structurer
 */
export interface ControlKeywords {
  if: string[];
  elseIf: string[];
  else: string[];
  loop: string[];
  /** Loop keywords that never exit on their own (`loop` in Rust and Ruby) */
  infiniteLoop: string[];
  /** Keywords whose loop condition comes after the body */
  doLoop: string[];
  switch: string[];
  /** Arm/case keywords inside a switch; `=>` and `->` arms are always recognised */
  arm: string[];
  try: string[];
  catch: string[];
  finally: string[];
  return: string[];
  throw: string[];
  break: string[];
  continue: string[];
  goto: string[];
}

const DEFAULT_KEYWORDS: ControlKeywords = {
  if: ['if'],
  elseIf: ['else if'],
  else: ['else'],
  loop: ['while', 'for'],
  infiniteLoop: [],
  doLoop: ['do'],
  switch: ['switch'],
  arm: ['case', 'default'],
  try: ['try'],
  catch: ['catch'],
  finally: ['finally'],
  return: ['return'],
  throw: ['throw'],
  break: ['break'],
  continue: ['continue'],
  goto: [],
};

const stringList = z.array(z.string());

const keywordsSchema = z
  .object({
    if: stringList,
    elseIf: stringList,
    else: stringList,
    loop: stringList,
    infiniteLoop: stringList,
    doLoop: stringList,
    switch: stringList,
    arm: stringList,
    try: stringList,
    catch: stringList,
    finally: stringList,
    return: stringList,
    throw: stringList,
    break: stringList,
    continue: stringList,
    goto: stringList,
  })
  .partial();

const profileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  extensions: stringList,
  blockStyle: z.enum(['brace', 'indent']),
  grammar: z.enum(['babel']).nullable(),
  lineComment: stringList,
  blockComment: z.tuple([z.string(), z.string()]).nullable(),
  closers: stringList.default([]),
  singleQuote: z.enum(['string', 'char']).default('string'),
  paramStyle: z.enum(['name-first', 'type-first']),
  visibility: z.enum(['keyword', 'underscore', 'capitalized']),
  defaultVisibility: z.enum(['public', 'private', 'internal']).default('public'),
  switchFallthrough: z.boolean().default(false),
  functionPatterns: stringList,
  classPatterns: stringList,
  importPatterns: stringList,
  variablePatterns: stringList,
  keywords: keywordsSchema.default({}),
});

const profileTableSchema = z.object({
  reservedWords: stringList,
  profiles: z.array(profileSchema).min(1),
});

export type ProfileDefinition = z.infer<typeof profileSchema>;

export interface LanguageProfile {
  id: string;
  name: string;
  extensions: string[];
  blockStyle: BlockStyle;
  /** Structural grammar available for this language, if any */
  grammar: 'babel' | null;
  lineComment: string[];
  blockComment: [string, string] | null;
  /** Block-closing keyword lines (`end`) for indentation-delimited languages */
  closers: string[];
  /** `char` when single quotes only delimit one-character literals */
  singleQuote: 'string' | 'char';
  paramStyle: 'name-first' | 'type-first';
  visibility: 'keyword' | 'underscore' | 'capitalized';
  /** Visibility of a keyword-style declaration written without a modifier */
  defaultVisibility: 'public' | 'private' | 'internal';
  /** `case` bodies without a jump run on into the next case */
  switchFallthrough: boolean;
  functionPatterns: RegExp[];
  classPatterns: RegExp[];
  /** Applied to whole file contents (global, multiline) */
  importPatterns: RegExp[];
  variablePatterns: RegExp[];
  keywords: ControlKeywords;
  reservedWords: ReadonlySet<string>;
}

export const GENERIC_PROFILE_ID = 'generic';

export class LanguageRegistry {
  private readonly byId = new Map<string, LanguageProfile>();
  private readonly byExt = new Map<string, LanguageProfile>();

  private constructor(profiles: LanguageProfile[]) {
    for (const profile of profiles) {
      this.byId.set(profile.id, profile);
      for (const ext of profile.extensions) {
        this.byExt.set(ext.toLowerCase(), profile);
      }
    }
  }

  /**
   * Registry over the bundled profile table
   */
  static load(): LanguageRegistry {
    return LanguageRegistry.fromTable(profileData);
  }

  /**
   * Validate and compile a profile table.
   * @throws GraphError when the table does not match the profile schema
   */
  static fromTable(data: unknown): LanguageRegistry {
    const parsed = profileTableSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new GraphError(
        'invalid-profile',
        `Invalid language profile table at ${issue.path.join('.')}: ${issue.message}`
      );
    }

    const reserved = new Set(parsed.data.reservedWords);
    const profiles = parsed.data.profiles.map((definition) => compileProfile(definition, reserved));
    if (!profiles.some((profile) => profile.id === GENERIC_PROFILE_ID)) {
      throw new GraphError('invalid-profile', `Profile table has no "${GENERIC_PROFILE_ID}" profile`);
    }
    return new LanguageRegistry(profiles);
  }

  get(id: string): LanguageProfile | undefined {
    return this.byId.get(id);
  }

  byExtension(extension: string): LanguageProfile | undefined {
    return this.byExt.get(extension.replace(/^\./, '').toLowerCase());
  }

  forFile(filePath: string): LanguageProfile | undefined {
    return this.byExtension(path.extname(filePath));
  }

  /** Fallback profile for files whose extension has no profile */
  get generic(): LanguageProfile {
    const profile = this.byId.get(GENERIC_PROFILE_ID);
    if (!profile) {
      throw new GraphError('invalid-profile', 'Generic profile missing');
    }
    return profile;
  }

  /** Every extension some profile claims, without the leading dot */
  extensions(): string[] {
    return [...this.byExt.keys()].sort();
  }

  profiles(): LanguageProfile[] {
    return [...this.byId.values()];
  }
}

function compileProfile(definition: ProfileDefinition, reserved: Set<string>): LanguageProfile {
  const compile = (sources: string[], flags: string) =>
    sources.map((source) => {
      try {
        return new RegExp(source, flags);
      } catch (error) {
        throw new GraphError(
          'invalid-profile',
          `Invalid pattern in profile "${definition.id}": ${error instanceof Error ? error.message : String(error)}`
        );
      }
    });

  return {
    id: definition.id,
    name: definition.name,
    extensions: definition.extensions,
    blockStyle: definition.blockStyle,
    grammar: definition.grammar,
    lineComment: definition.lineComment,
    blockComment: definition.blockComment,
    closers: definition.closers,
    singleQuote: definition.singleQuote,
    paramStyle: definition.paramStyle,
    visibility: definition.visibility,
    defaultVisibility: definition.defaultVisibility,
    switchFallthrough: definition.switchFallthrough,
    functionPatterns: compile(definition.functionPatterns, ''),
    classPatterns: compile(definition.classPatterns, ''),
    importPatterns: compile(definition.importPatterns, 'gm'),
    variablePatterns: compile(definition.variablePatterns, ''),
    keywords: { ...DEFAULT_KEYWORDS, ...definition.keywords },
    reservedWords: reserved,
  };
}
