import figlet from "figlet";
import { logger } from "./logger.js";

/**
 * Generate ASCII art text in figlet's Standard font, falling back to the
 * plain message if rendering fails.
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, {
      font: "Standard",
      horizontalLayout: "default",
      verticalLayout: "default",
      width: 80,
      whitespaceBreak: true,
    });
  } catch (error) {
    logger.warn("Warning: Font rendering failed:", error);
    return msg;
  }
};
