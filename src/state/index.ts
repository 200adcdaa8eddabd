export {
  MemoryScratchpad,
  FileScratchpad,
  readProjectDependencies,
  PROJECT_DEPENDENCIES_KEY,
  LAST_GENERATED_TEST_KEY,
  type Scratchpad,
  type AgentState,
  type LastGeneratedTest,
} from "./scratchpad.js";
