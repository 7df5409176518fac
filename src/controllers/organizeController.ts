import { Reply } from '../types/transport.js';
import { BulkAnswer } from '../types/session.js';
import { OrganizeFlow } from '../services/organize/OrganizeFlow.js';
import { BulkPropagationService } from '../services/organize/BulkPropagationService.js';

/**
 * Organize Controller
 *
 * The manual organize dialog and bulk propagation.
 */
export class OrganizeController {
  constructor(
    private readonly flow: OrganizeFlow,
    private readonly bulk: BulkPropagationService
  ) {}

  organize = (userId: number): Promise<Reply> => this.flow.start(userId);

  selectFile = (userId: number, key: string): Promise<Reply> => this.flow.selectFile(userId, key);

  chooseCategory = (userId: number, choice: string): Reply => this.flow.chooseCategory(userId, choice);

  text = (userId: number, text: string): Promise<Reply | null> => this.flow.handleText(userId, text);

  cancel = (userId: number): Reply => this.flow.cancel(userId);

  propagate = (userId: number): Promise<Reply> => this.bulk.start(userId);

  bulkAnswer = (userId: number, answer: BulkAnswer): Promise<Reply> => this.bulk.answer(userId, answer);
}
