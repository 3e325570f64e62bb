import { simpleGit, type SimpleGit } from "simple-git";
import type { PublishCollaborator } from "./types.js";

/**
 * Pushes a results directory as the sole content of a branch (gh-pages by
 * default). The branch history is replaced on every publish.
 */
export class GitPublisher implements PublishCollaborator {
  constructor(private readonly gitFactory: (dir: string) => SimpleGit = (dir) => simpleGit(dir)) {}

  async publish(resultsDir: string, target: { remoteUrl: string; branch: string }): Promise<void> {
    const git = this.gitFactory(resultsDir);
    await git.init();
    await git.checkout(["-B", target.branch]);
    await git.add(["--all", "."]);
    await git.addConfig("user.name", "comfy-test");
    await git.addConfig("user.email", "comfy-test@users.noreply.github.com");
    await git.commit("Publish test results", undefined, { "--allow-empty": null });
    await git.push(target.remoteUrl, `${target.branch}:${target.branch}`, ["--force"]);
  }
}
