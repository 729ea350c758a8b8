/**
 * Interactive prompts, loaded lazily so non-interactive runs never import
 * the prompt library.
 */

import { TIER_IDS, TIERS, type Tier } from "../config/constants.js";

export interface Prompts {
  confirm(message: string): Promise<boolean>;
  selectTier(message: string): Promise<Tier>;
  input(message: string, validate: (value: string) => string | true): Promise<string>;
}

export const inquirerPrompts: Prompts = {
  async confirm(message) {
    const { confirm } = await import("@inquirer/prompts");
    return confirm({ message, default: false });
  },

  async selectTier(message) {
    const { select } = await import("@inquirer/prompts");
    return select<Tier>({
      message,
      choices: TIER_IDS.map((tier) => ({
        name: `${tier}. ${TIERS[tier].name}`,
        value: tier,
        description: TIERS[tier].description,
      })),
      default: "2",
    });
  },

  async input(message, validate) {
    const { input } = await import("@inquirer/prompts");
    return input({ message, validate });
  },
};
