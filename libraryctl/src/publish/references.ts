import type { Platform } from "../types/manifest.js";
import { platformSlug } from "../types/manifest.js";

/** `<registry>/<namespace>/<name>` */
export function repository(registry: string, namespace: string, name: string): string {
  return `${registry.replace(/\/+$/, "")}/${namespace}/${name}`;
}

/** Canonical published reference, e.g. `images.canfar.net/library/base:latest`. */
export function canonicalReference(registry: string, namespace: string, name: string, tag: string): string {
  return `${repository(registry, namespace, name)}:${tag}`;
}

/** Where a platform image is pushed before publication. */
export function stagingReference(registry: string, stagingNamespace: string, name: string, commit: string, platform: Platform): string {
  return `${repository(registry, stagingNamespace, name)}:${commit.slice(0, 12)}-${platformSlug(platform)}`;
}

/** Strip the tag and/or digest from a reference. A port in the registry host is kept. */
export function repositoryOf(reference: string): string {
  const at = reference.indexOf("@");
  const withoutDigest = at === -1 ? reference : reference.slice(0, at);
  const slash = withoutDigest.lastIndexOf("/");
  const colon = withoutDigest.lastIndexOf(":");
  return colon > slash ? withoutDigest.slice(0, colon) : withoutDigest;
}

/** `repo@sha256:…` for a tagged reference and its digest. */
export function digestReference(reference: string, digest: string): string {
  return `${repositoryOf(reference)}@${digest}`;
}

/** `repo:tag@sha256:…`, the form signatures are made over. */
export function pinnedReference(reference: string, digest: string): string {
  const at = reference.indexOf("@");
  return `${at === -1 ? reference : reference.slice(0, at)}@${digest}`;
}

const DIGEST_RE = /^sha256:[a-f0-9]{64}$/;

export function isDigest(value: string): boolean {
  return DIGEST_RE.test(value);
}
