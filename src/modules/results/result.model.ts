export interface NewResult {
  surname: string;
  name: string;
  group: string;
  score: number;
  total: number;
}

export interface ResultRecord extends NewResult {
  id: number;
  timestamp: string;
}

export interface ResultStore {
  init(): void;
  insert(result: NewResult): ResultRecord;
  listAll(): ResultRecord[];
}
