import { Controller, Get, Param, ParseUUIDPipe, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { AuthUser } from '../../../common/interfaces/authenticated-request.interface';
import { TransactionLedgerService } from '../services/transaction-ledger.service';
import { TransactionResponse, presentTransaction } from '../presenters/payment.presenters';

@ApiTags('payments')
@Controller('payments/transactions')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth()
export class TransactionController {
  constructor(private readonly ledger: TransactionLedgerService) {}

  @Get()
  @ApiOperation({ summary: "List the caller's transactions" })
  @ApiResponse({ status: 200, description: 'Transactions, newest first' })
  async listTransactions(@CurrentUser() user: AuthUser): Promise<TransactionResponse[]> {
    const transactions = await this.ledger.listForUser(user.id);
    return transactions.map((transaction) => presentTransaction(transaction));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one of the caller\'s transactions' })
  @ApiResponse({ status: 200, description: 'The transaction' })
  @ApiResponse({ status: 404, description: 'Transaction not found' })
  async getTransaction(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<TransactionResponse> {
    return presentTransaction(await this.ledger.findForUser(id, user.id));
  }
}
