// Типы результатов поиска в виде для отображения.

// Найденный сегмент.
export interface SegmentResult {
  id: string;
  text: string;
  // MM:SS.
  start: string;
  end: string;
  startSeconds: number;
  endSeconds: number;
  videoReference: string;
  // Ссылка на момент видео; пустая, если идентификатор видео не найден.
  deepLink: string;
  score: number;
  groupId?: string;
  sequence?: number;
  question?: string;
  answer?: string;
  isFollowUp?: boolean;
}

// Сегмент внутри группы диалога.
export interface GroupItem extends Omit<SegmentResult, 'score'> {
  // Сегмент был среди найденных.
  isMatch: boolean;
  // Оценка из выдачи; 0 для сегментов, добавленных как контекст.
  matchScore: number;
}

// Группа вопрос/ответ, упорядоченная по sequence.
export interface ConversationGroup {
  groupId: string;
  items: GroupItem[];
}
