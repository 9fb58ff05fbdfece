export { BookAuthorsRepository, type BookAuthorRow } from './BookAuthorsRepository';
export { BooksRepository, type BookFilter, type BookRow } from './BooksRepository';
export { CacheRepository } from './CacheRepository';
export { CatalogCache } from './CatalogCache';
export { DownloadsRepository, type DownloadRecord, type LedgerEvent, type LedgerListener } from './DownloadsRepository';
export { LessonsRepository, type LessonFilter, type LessonRow } from './LessonsRepository';
export { SeriesRepository, type SeriesFilter, type SeriesRow } from './SeriesRepository';
export { TeachersRepository, type TeacherRow } from './TeachersRepository';
export { ThemesRepository, type ThemeRow } from './ThemesRepository';
