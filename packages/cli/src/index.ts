/**
 * Scentify CLI — npm run cli -- <command>
 *
 * Commands:
 *   search     — search the catalog
 *   similar    — perfumes similar to a saved one
 *   quiz       — match questionnaire answers
 *   interact   — record a view, click or favorite
 *   inventory  — list, add or remove owned perfumes
 *   warm       — seed the catalog from the online source
 *   stats      — local counts
 */

import { createProgram } from "./program";

await createProgram().parseAsync();
