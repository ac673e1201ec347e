import * as core from "@actions/core";
import { runAction } from "./action.js";

runAction({ core, env: process.env }).catch((error: unknown) => {
  core.setFailed(error instanceof Error ? error.message : String(error));
});
