/**
 * Identifies the version control origin of the source code that was analyzed.
 */
export interface VersionControlProvenance {
  /** An absolute URI that specifies the location of the repository. */
  repositoryUri: string;
  /** A string that uniquely and permanently identifies the revision. */
  revisionId: string;
  branch: string;
}

export const VERSION_CONTROL_PROVENANCE_PROPERTY = "versionControlProvenance";
