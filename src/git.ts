import { simpleGit } from 'simple-git';

export type RevisionInfo = {
  commit: string;
  branch: string | null;
  path: string;
};

/**
 * Commit, branch and git directory of the repository containing `cwd`.
 * Resolves to null when there is no repository, no commit yet, or no git
 * binary to ask.
 */
export async function getRevisionInfo(cwd: string = process.cwd()): Promise<RevisionInfo | null> {
  try {
    const git = simpleGit(cwd);
    if (!(await git.checkIsRepo())) {
      return null;
    }

    const commit = (await git.revparse(['HEAD'])).trim();
    const head = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    const gitDir = (await git.revparse(['--absolute-git-dir'])).trim();
    return {
      commit,
      // --abbrev-ref prints the literal HEAD when detached
      branch: head === 'HEAD' ? null : head,
      path: gitDir,
    };
  } catch {
    return null;
  }
}
