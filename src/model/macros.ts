/**
 * Macro nodes
 *
 * A macro is `name:target[params]` (inline) or `name::target[params]` (block).
 * `image`, `video` and `include` get typed fields derived from the raw
 * parameter map; any other name becomes a generic macro node.
 *
 * @since 2025-12-09
 */

import { createElementBase } from './elements.js';
import type {
  AnyMacroNode,
  ImageMacroNode,
  IncludeMacroNode,
  MacroNode,
  MacroType,
  VideoMacroNode,
} from './types.js';

/**
 * Video container formats guessed from the file extension
 */
const VIDEO_FORMATS: Record<string, string> = {
  '.mp4': 'mp4',
  '.webm': 'webm',
  '.ogg': 'ogg',
  '.avi': 'avi',
  '.mov': 'mov',
};

const DEFAULT_VIDEO_FORMAT = 'mp4';

/**
 * Build the node for a macro, picking the specialised kind from its name
 */
export function createMacroElement(
  name: string,
  target: string,
  parameters: Map<string, string>,
  macroType: MacroType
): AnyMacroNode {
  switch (name.toLowerCase()) {
    case 'image':
      return createImageMacro(target, parameters, macroType);
    case 'video':
      return createVideoMacro(target, parameters, macroType);
    case 'include':
      return createIncludeMacro(target, parameters, macroType);
    default:
      return createMacro(name, target, parameters, macroType);
  }
}

export function createMacro(
  name: string,
  target: string,
  parameters: Map<string, string>,
  macroType: MacroType
): MacroNode {
  return { ...createElementBase('macro'), name, target, parameters, macroType };
}

export function createImageMacro(
  source: string,
  parameters: Map<string, string> = new Map(),
  macroType: MacroType = 'block'
): ImageMacroNode {
  return {
    ...createElementBase('image-macro'),
    name: 'image',
    target: source,
    parameters,
    macroType,
    source,
    alt: parameters.get('alt') || baseNameWithoutExtension(source),
    title: parameters.get('title'),
    width: parseDimension(parameters.get('width')),
    height: parseDimension(parameters.get('height')),
    link: parameters.get('link'),
    align: parameters.get('align'),
    float: parameters.get('float'),
  };
}

export function createVideoMacro(
  source: string,
  parameters: Map<string, string> = new Map(),
  macroType: MacroType = 'block'
): VideoMacroNode {
  return {
    ...createElementBase('video-macro'),
    name: 'video',
    target: source,
    parameters,
    macroType,
    source,
    title: parameters.get('title'),
    width: parseDimension(parameters.get('width')),
    height: parseDimension(parameters.get('height')),
    poster: parameters.get('poster'),
    autoplay: parseFlag(parameters.get('autoplay'), false),
    controls: parseFlag(parameters.get('controls'), true),
    loop: parseFlag(parameters.get('loop'), false),
    muted: parseFlag(parameters.get('muted'), false),
    videoFormat: parameters.get('format') || guessVideoFormat(source),
  };
}

export function createIncludeMacro(
  filePath: string,
  parameters: Map<string, string> = new Map(),
  macroType: MacroType = 'block'
): IncludeMacroNode {
  const opts = (parameters.get('opts') ?? '').split(',').map((o) => o.trim());
  return {
    ...createElementBase('include-macro'),
    name: 'include',
    target: filePath,
    parameters,
    macroType,
    filePath,
    levelOffset: parameters.get('leveloffset'),
    lines: parameters.get('lines'),
    tags: parameters.get('tags') ?? parameters.get('tag'),
    indent: parameters.get('indent'),
    optional: parseFlag(parameters.get('optional'), false) || opts.includes('optional'),
  };
}

/**
 * `true`, `yes` (any case) and `1` are true; a missing value gives the default
 */
export function parseFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === 'yes' || normalized === '1';
}

function parseDimension(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

function extensionOf(source: string): string {
  const fileName = source.split(/[\\/]/).pop() ?? source;
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(dot).toLowerCase() : '';
}

function baseNameWithoutExtension(source: string): string {
  const fileName = source.split(/[\\/]/).pop() ?? source;
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}

function guessVideoFormat(source: string): string {
  return VIDEO_FORMATS[extensionOf(source)] ?? DEFAULT_VIDEO_FORMAT;
}
