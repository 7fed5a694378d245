/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

export interface Message {
  to: string;
  from: string;
  subject: string;
  text: string;
  html: string;
  headers?: { [name: string]: string };
  categories?: string[];
}
