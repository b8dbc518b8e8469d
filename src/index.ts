import * as core from "@actions/core";
import { createConfig, readInputs } from "./config";
import { errorMessage } from "./errors";
import { generateReleaseNotes, htmlPath } from "./generateReleaseNotes";
import { releaseTagName } from "./tagCatalog";

async function run(): Promise<void> {
  try {
    const { config, options } = createConfig(readInputs());
    const scope = options.components ? options.components.join(", ") : "all components";
    core.info(`Generating release notes for ${scope} under '${config.componentRootPath}'...`);

    const documents = await generateReleaseNotes(config, options);

    const written = documents.flatMap((d) =>
      d.html !== undefined ? [d.markdownPath, htmlPath(d.markdownPath)] : [d.markdownPath],
    );
    core.setOutput("documents", JSON.stringify(written));
    if (options.pendingRelease) {
      const { component, version } = options.pendingRelease;
      const tag = releaseTagName(component, version);
      core.setOutput("release-tag", tag);
      core.info(`Commit the documents, then tag the release commit with '${tag}'.`);
    }
    core.info(`Generated ${documents.length} document(s).`);
  } catch (err) {
    core.setFailed(errorMessage(err));
  }
}

run();
