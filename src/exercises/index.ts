import type { Exercise } from '../core/types.js';
import { basicOperations } from './basic-operations.js';

export const allExercises: Exercise[] = [...basicOperations];
