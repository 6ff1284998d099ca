/** Library image manifest, one YAML document per image. */
export const PLATFORMS = [
  "linux/amd64",
  "linux/arm64",
  "linux/arm/v5",
  "linux/arm/v6",
  "linux/arm/v7",
  "windows/amd64",
] as const;

export type Platform = (typeof PLATFORMS)[number];

export const BUILDERS = ["buildkit", "classic", "oci-import"] as const;

export type BuilderBackend = (typeof BUILDERS)[number];

export type Maintainer = {
  name: string;
  email: string;
  github?: string;
  gitlab?: string;
};

export type GitSource = {
  repo: string;
  fetch: string;
  tag?: string;
  sha?: string;
};

export type BuildSpec = {
  path: string;
  dockerfile: string;
  context: string;
  builder: BuilderBackend;
  platforms: Platform[];
  tags: string[];
  args: Record<string, string> | null;
  annotations: Record<string, string> | null;
  labels: Record<string, string> | null;
  target: string | null;
  test: string | null;
};

export type ManifestMetadata = {
  identifier: string;
  project: string;
};

export type Manifest = {
  version: number;
  name: string;
  maintainers: Maintainer[];
  git: GitSource;
  build: BuildSpec;
  metadata: ManifestMetadata;
};

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

export function isBuilderBackend(value: string): value is BuilderBackend {
  return (BUILDERS as readonly string[]).includes(value);
}

/** The ref that pins the source revision: the tag, else the sha. */
export function pinnedRef(git: GitSource): string {
  return git.tag ?? git.sha ?? "";
}

/** "linux/arm/v7" → "linux-arm-v7" */
export function platformSlug(platform: Platform): string {
  return platform.replace(/\//g, "-");
}
