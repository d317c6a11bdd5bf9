// src/constants.ts

export const CLI_NAME = "diff-sync";
