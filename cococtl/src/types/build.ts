/** Output of one successful image build. Never mutated after creation. */
export type BuildResult = Readonly<{
  componentName: string;
  version: string;
  /** Version-qualified local tag, `name:version`. */
  imageReference: string;
  digest: string;
  buildDurationMs: number;
  logExcerpt: string;
}>;

export type RegistrationOutcome = {
  imageReference: string;
  namespace: string;
  /** False when the image was already registered with the same digest. */
  changed: boolean;
};
