import { InvalidReferenceError } from "../errors";

export const URI_SCHEME = "spotify";
export const WEB_PLAYER_HOST = "open.spotify.com";

export const referenceKinds = ["track", "playlist", "album", "artist"] as const;
export type ReferenceKind = (typeof referenceKinds)[number];

export type CanonicalReference =
  | { readonly kind: ReferenceKind; readonly id: string; readonly uri: string }
  // Unrecognized kinds keep the caller's input so it can be reported upstream.
  | { readonly kind: "other"; readonly id: ""; readonly uri: string };

function isReferenceKind(kind: string): kind is ReferenceKind {
  return (referenceKinds as readonly string[]).includes(kind);
}

export function formatUri(kind: ReferenceKind, id: string): string {
  return `${URI_SCHEME}:${kind}:${id}`;
}

function toReference(input: string, kind: string, id: string): CanonicalReference {
  let reference: CanonicalReference;
  if (!isReferenceKind(kind)) {
    reference = { kind: "other", id: "", uri: input };
  } else if (!id) {
    throw new InvalidReferenceError(input, `missing ${kind} id`);
  } else {
    reference = { kind, id, uri: formatUri(kind, id) };
  }
  return Object.freeze(reference);
}

/**
 * Normalizes a `spotify:<kind>:<id>` URI or an `https://open.spotify.com/<kind>/<id>` URL.
 * Only the first two path segments of a URL matter; query strings such as `?si=` are dropped.
 */
export function parseUri(input: string): CanonicalReference {
  if (input.startsWith(`${URI_SCHEME}:`)) {
    const segments = input.split(":");
    if (segments.length < 3) {
      throw new InvalidReferenceError(input, "expected spotify:<kind>:<id>");
    }
    return toReference(input, segments[1], segments[2]);
  }

  let url: URL;
  try {
    url = new URL(input);
  } catch {
    throw new InvalidReferenceError(input, "not a URI or URL");
  }

  if (url.hostname !== WEB_PLAYER_HOST) {
    throw new InvalidReferenceError(input, `unsupported host '${url.hostname}'`);
  }

  const path = url.pathname.split("/").slice(1);
  if (path.length < 2) {
    throw new InvalidReferenceError(input, "expected /<kind>/<id> path");
  }

  return toReference(input, path[0], path[1]);
}
