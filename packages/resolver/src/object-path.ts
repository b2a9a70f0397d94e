/**
 * Object paths: the structural split of a dotted identifier such as
 * `perekrestok_api.endpoints.catalog.ProductService.similar` into
 * package, namespace segments, class and member.
 */

import { MalformedIdentifierError } from "@docschema/errors";

import { deepFreeze } from "./freeze.js";
import type { ObjectLayout, ObjectPath } from "./types.js";

const CLASS_NAME_PATTERN = /^[A-Z]/;

/**
 * Parses a dotted identifier into an ObjectPath.
 *
 * The dotted string alone cannot tell a package root from a module segment,
 * so callers that know the structure pass it in `layout`. Without hints the
 * leading segment is the package whenever there are two or more segments, and
 * the segment before the member is a class when it starts upper-case.
 *
 * @throws {MalformedIdentifierError} for an empty identifier, or when an
 *   explicit layout asks for more parts than the identifier has
 */
export function parseObjectPath(identifier: string, layout?: ObjectLayout): ObjectPath {
  if (identifier.length === 0) {
    throw new MalformedIdentifierError(identifier);
  }

  const segments = identifier.split(".");
  const memberName = segments[segments.length - 1] ?? "";
  const leading = segments.slice(0, -1);

  let hasPackage = layout?.hasPackage ?? leading.length > 0;
  let hasClass =
    layout?.hasClass ?? (leading.length > 0 && CLASS_NAME_PATTERN.test(leading[leading.length - 1] ?? ""));

  const required = (hasPackage ? 1 : 0) + (hasClass ? 1 : 0);
  if (required > leading.length) {
    // Only a default may give way; two explicit flags that cannot both hold are a caller error.
    if (layout?.hasPackage === undefined && hasPackage) {
      hasPackage = false;
    } else if (layout?.hasClass === undefined && hasClass) {
      hasClass = false;
    } else {
      throw new MalformedIdentifierError(
        identifier,
        `layout requires ${required} leading segment(s) but only ${leading.length} present`,
      );
    }
  }

  const packageName = hasPackage ? leading[0] : undefined;
  const className = hasClass ? leading[leading.length - 1] : undefined;
  const pathSegments = leading.slice(hasPackage ? 1 : 0, hasClass ? -1 : undefined);

  return deepFreeze({
    ...(packageName !== undefined ? { package: packageName } : {}),
    pathSegments,
    ...(className !== undefined ? { className } : {}),
    memberName,
  });
}

/**
 * Builds an ObjectPath from an explicit structural split.
 *
 * @throws {MalformedIdentifierError} when the parts format to an empty identifier
 */
export function createObjectPath(parts: {
  readonly package?: string;
  readonly pathSegments?: readonly string[];
  readonly className?: string;
  readonly memberName: string;
}): ObjectPath {
  const path: ObjectPath = {
    ...(parts.package !== undefined ? { package: parts.package } : {}),
    pathSegments: [...(parts.pathSegments ?? [])],
    ...(parts.className !== undefined ? { className: parts.className } : {}),
    memberName: parts.memberName,
  };

  const identifier = formatObjectPath(path);
  if (identifier.length === 0) {
    throw new MalformedIdentifierError(identifier);
  }

  return deepFreeze(path);
}

/**
 * Joins the parts of a path with ".", the inverse of parseObjectPath().
 */
export function formatObjectPath(path: ObjectPath): string {
  return [
    ...(path.package !== undefined ? [path.package] : []),
    ...path.pathSegments,
    ...(path.className !== undefined ? [path.className] : []),
    path.memberName,
  ].join(".");
}

/**
 * Package and namespace segments joined with "." (empty for top-level members).
 */
export function formatPackageName(path: ObjectPath): string {
  return [...(path.package !== undefined ? [path.package] : []), ...path.pathSegments].join(".");
}
