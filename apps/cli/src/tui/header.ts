import { getVersion } from "../utils/version.js";
import { colors, paint } from "./styles.js";

export const printHeader = (command: string): void => {
  console.log();
  console.log(`${paint(`logstamp v${getVersion()}`, colors.brand)} ${command}`);
  console.log();
};
