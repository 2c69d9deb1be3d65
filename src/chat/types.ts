export interface ChatMessage {
  player: string;
  character?: string;
  message: string;
}
