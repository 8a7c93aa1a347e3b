export interface DocumentTag {
  id: string;
  documentId: string;
  tag: string;
}
