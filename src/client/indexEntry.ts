import { mountGenerationForm } from './generationForm';

mountGenerationForm();
