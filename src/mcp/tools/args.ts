/**
 * Argument schemas shared by several tools.
 */

import { z } from 'zod';

export const projectPathArg = z.string().describe('Path of the project root directory');

export const filePathArg = z.string().describe('File path relative to the project root, or absolute inside it');
