export type { IRepository, ISoftDeleteRepository, Page, Pageable, Sort } from './IRepository.js';
