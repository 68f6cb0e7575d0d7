export { splitIntoChunks } from "./chunking";
export { renderWordlist } from "./renderer";
export { planArtifacts, chunkPath } from "./planner";
export { writeArtifacts, listWordlistFiles, rebuildIndex } from "./writer";
