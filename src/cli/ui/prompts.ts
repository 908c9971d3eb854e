/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const confirm = p.confirm;
export const select = p.select;
export const text = p.text;
export const password = p.password;
export const isCancel = p.isCancel;
