/**
 * @module crawler/resource
 * @fileoverview Typed resources and the classifier that routes links to them.
 *
 * A {@link Resource} is a closed union: every consumer (the classifier below,
 * {@link resourceKind}, {@link isContainer}, {@link resourceName} and the
 * handler dispatch in `crawler/process`) switches over `type` exhaustively, so
 * adding a variant fails to compile until every one of them handles it.
 *
 * ## Routing Table
 * ```
 *   thr_pk present ─────────────────────────────────────────> Thread
 *   goto.php?target=
 *     wiki_*  -> Wiki         root_* -> Generic
 *     crs_*   -> Course (ref_id)     frm_* -> Forum (ref_id)
 *     lm_*    -> Presentation        fold_* -> Folder (ref_id)
 *     file_*download -> File (needs item properties)
 *     file_*         -> Generic (metadata page)
 *     other / none   -> Generic
 *   cmd=showThreads ────────────────────────────────────────> Forum
 *   baseClass (any case)
 *     ilexercisehandlergui -> ExerciseHandler
 *     ililwikihandlergui   -> Wiki
 *     illinkresourcehandlergui -> Weblink
 *     ilobjsurveygui       -> Survey
 *     illmpresentationgui  -> Presentation
 *     ilrepositorygui      -> view|render: Folder, other cmd: Generic, no cmd: Course
 *     ilobjplugindispatchgui -> PluginDispatch
 *     ilpersonaldesktopgui -> PersonalDesktop
 *     anything else        -> Generic
 * ```
 *
 * Unrecognised shapes become `Generic`, which handlers log and skip.
 */

import { parseLocator, type Locator } from "./locator.js";
import {
  MissingFileMetadataError,
  UnclassifiableLocatorError,
} from "../utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

interface Named<T extends string> {
  readonly type: T;
  readonly name: string;
  readonly locator: Locator;
}

interface Unnamed<T extends string> {
  readonly type: T;
  readonly locator: Locator;
}

export type Course = Named<"Course">;
export type Folder = Named<"Folder">;
export type PersonalDesktop = Unnamed<"PersonalDesktop">;
export type File = Named<"File">;
export type Forum = Named<"Forum">;
/** Named after its `thr_pk`. */
export type Thread = Unnamed<"Thread">;
export type Wiki = Named<"Wiki">;
export type ExerciseHandler = Named<"ExerciseHandler">;
export type Weblink = Named<"Weblink">;
export type Survey = Named<"Survey">;
export type Presentation = Named<"Presentation">;
export type PluginDispatch = Named<"PluginDispatch">;
/** Named after its raw URL. */
export type Video = Unnamed<"Video">;
export type Generic = Named<"Generic">;

export type Resource =
  | Course
  | Folder
  | PersonalDesktop
  | File
  | Forum
  | Thread
  | Wiki
  | ExerciseHandler
  | Weblink
  | Survey
  | Presentation
  | PluginDispatch
  | Video
  | Generic;

/**
 * Item properties shown next to a file in a container listing, needed to name
 * a direct download.
 *
 * @example { extension: "pdf", version: "Version: 3" }
 */
export interface FileMetadataHint {
  /** Text of the first item property, e.g. `"pdf"`. */
  extension: string;
  /** Text of the third item property, e.g. `"Version: 3"` or `"12.04.2024"`. */
  version: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Accessors
 * ──────────────────────────────────────────────────────────────────────────── */

export function assertNever(value: never): never {
  throw new Error(`unhandled resource variant: ${JSON.stringify(value)}`);
}

/**
 * Short lowercase tag used in log lines, e.g. `"exercise handler"`.
 */
export function resourceKind(resource: Resource): string {
  switch (resource.type) {
    case "Course":
      return "course";
    case "Folder":
      return "folder";
    case "PersonalDesktop":
      return "personal desktop";
    case "File":
      return "file";
    case "Forum":
      return "forum";
    case "Thread":
      return "thread";
    case "Wiki":
      return "wiki";
    case "ExerciseHandler":
      return "exercise handler";
    case "Weblink":
      return "weblink";
    case "Survey":
      return "survey";
    case "Presentation":
      return "presentation";
    case "PluginDispatch":
      return "plugin dispatch";
    case "Video":
      return "video";
    case "Generic":
      return "generic";
    default:
      return assertNever(resource);
  }
}

/**
 * Whether processing the resource may discover and submit children. The
 * ignore matcher evaluates containers with directory semantics.
 */
export function isContainer(resource: Resource): boolean {
  switch (resource.type) {
    case "Course":
    case "Folder":
    case "PersonalDesktop":
    case "Forum":
    case "Thread":
    case "ExerciseHandler":
    case "PluginDispatch":
      return true;
    case "File":
    case "Wiki":
    case "Weblink":
    case "Survey":
    case "Presentation":
    case "Video":
    case "Generic":
      return false;
    default:
      return assertNever(resource);
  }
}

/**
 * Display name, used as the local file or directory name. The personal
 * desktop is only ever the root of a run and has none.
 */
export function resourceName(resource: Resource): string | undefined {
  switch (resource.type) {
    case "Course":
    case "Folder":
    case "File":
    case "Forum":
    case "Wiki":
    case "ExerciseHandler":
    case "Weblink":
    case "Survey":
    case "Presentation":
    case "PluginDispatch":
    case "Generic":
      return resource.name;
    case "Thread":
      return resource.locator.thr_pk;
    case "Video":
      return resource.locator.raw;
    case "PersonalDesktop":
      return undefined;
    default:
      return assertNever(resource);
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Classifier
 * ──────────────────────────────────────────────────────────────────────────── */

const VERSION_PREFIX = "Version: ";

/**
 * The id between the first and second `_` of a redirector target:
 * `"crs_55_oldstuff"` gives `"55"`.
 */
function targetRefId(target: string): string {
  return target.split("_")[1] ?? "";
}

function withRefId(locator: Locator, target: string): Locator {
  return { ...locator, ref_id: targetRefId(target) };
}

/**
 * Compose `{name}[_v{version}].{extension}` from a listing item's properties.
 */
function fileNameFromHint(name: string, hint: FileMetadataHint): string {
  const version = hint.version.trim();
  const suffix = version.startsWith(VERSION_PREFIX)
    ? `_v${version.slice(VERSION_PREFIX.length)}`
    : "";
  return `${name}${suffix}.${hint.extension.trim()}`;
}

function classifyRedirector(
  locator: Locator,
  name: string,
  hint: FileMetadataHint | undefined,
): Resource {
  const target = locator.target ?? "NONE";

  if (target.startsWith("wiki_")) {
    return { type: "Wiki", name, locator };
  }
  if (target.startsWith("root_")) {
    // magazine / portal pages
    return { type: "Generic", name, locator };
  }
  if (target.startsWith("crs_")) {
    return { type: "Course", name, locator: withRefId(locator, target) };
  }
  if (target.startsWith("frm_")) {
    return { type: "Forum", name, locator: withRefId(locator, target) };
  }
  if (target.startsWith("lm_")) {
    return { type: "Presentation", name, locator };
  }
  if (target.startsWith("fold_")) {
    return { type: "Folder", name, locator: withRefId(locator, target) };
  }
  if (target.startsWith("file_")) {
    if (!target.endsWith("download")) {
      // info page of the file, not the file itself
      return { type: "Generic", name, locator };
    }
    if (hint === undefined) {
      throw new MissingFileMetadataError(locator.raw);
    }
    return { type: "File", name: fileNameFromHint(name, hint), locator };
  }
  return { type: "Generic", name, locator };
}

function classifyByBaseClass(locator: Locator, name: string): Resource {
  switch ((locator.baseClass ?? "").toLowerCase()) {
    case "ilexercisehandlergui":
      return { type: "ExerciseHandler", name, locator };
    case "ililwikihandlergui":
      return { type: "Wiki", name, locator };
    case "illinkresourcehandlergui":
      return { type: "Weblink", name, locator };
    case "ilobjsurveygui":
      return { type: "Survey", name, locator };
    case "illmpresentationgui":
      return { type: "Presentation", name, locator };
    case "ilrepositorygui":
      if (locator.cmd === "view" || locator.cmd === "render") {
        return { type: "Folder", name, locator };
      }
      if (locator.cmd !== undefined) {
        return { type: "Generic", name, locator };
      }
      return { type: "Course", name, locator };
    case "ilobjplugindispatchgui":
      return { type: "PluginDispatch", name, locator };
    case "ilpersonaldesktopgui":
      return { type: "PersonalDesktop", locator };
    default:
      return { type: "Generic", name, locator };
  }
}

/**
 * Route a parsed link to its resource variant. Pure: the same arguments always
 * produce structurally equal results.
 *
 * @param locator - Parsed link.
 * @param name - Display name, usually the link text.
 * @param baseUrl - Site root; `{baseUrl}goto.php` is the redirector.
 * @param hint - Item properties, required only for direct file downloads.
 * @throws {MissingFileMetadataError} For a `file_…download` target without `hint`.
 *
 * @example
 * ```ts
 * const locator = parseLocator("goto.php?target=crs_55_oldstuff", base);
 * classify(locator, "Algorithms", base);
 * // => { type: "Course", name: "Algorithms", locator: { ..., ref_id: "55" } }
 * ```
 */
export function classify(
  locator: Locator,
  name: string,
  baseUrl: string,
  hint?: FileMetadataHint,
): Resource {
  if (locator.thr_pk !== undefined) {
    return { type: "Thread", locator };
  }

  if (locator.raw.startsWith(`${baseUrl}goto.php`)) {
    return classifyRedirector(locator, name, hint);
  }

  if (locator.cmd === "showThreads") {
    return { type: "Forum", name, locator };
  }

  return classifyByBaseClass(locator, name);
}

/**
 * Clean the visible text of a link for use as a display name.
 */
export function linkName(text: string): string {
  return text.replaceAll("/", "-").trim();
}

/**
 * Parse and classify an anchor's `href`.
 *
 * @throws {UnclassifiableLocatorError} If the anchor has no `href`.
 * @throws {InvalidLocatorError} If the `href` is not a valid URL.
 * @throws {MissingFileMetadataError} See {@link classify}.
 */
export function resourceFromLink(
  href: string | undefined,
  text: string,
  baseUrl: string,
  hint?: FileMetadataHint,
): Resource {
  if (href === undefined || href.trim() === "") {
    throw new UnclassifiableLocatorError(`link "${text.trim()}" is missing href`);
  }
  return classify(parseLocator(href, baseUrl), linkName(text), baseUrl, hint);
}
