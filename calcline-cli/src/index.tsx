import React from "react";
import { render } from "ink";
import { CalcSession, loadSettings } from "calcline-main";
import { App } from "./app/app.js";
import { runCallMode } from "./call-mode.js";

const settings = await loadSettings();
const session = new CalcSession(settings);
const args = process.argv.slice(2);

if (args.length > 0) {
  const { stdout, stderr, exitCode } = runCallMode(args, session);
  if (stdout.length > 0) console.log(stdout);
  if (stderr.length > 0) console.error(stderr);
  process.exitCode = exitCode;
} else {
  render(<App session={session} />);
}
