export enum SortOrder {
  ASC = 'asc', // Insertion order
  DESC = 'desc', // Newest first
}
