/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to set a default image tool path, failure policy");
  console.log("or script source. See src/config/default.json for available options.");
}
