export { DEFAULT_CATEGORY_TABLE, loadCategoryTable, parseCategoryTable } from './category-table';
