export interface DeleteRecordResponseDto {
  id: string;
}
