import { Controller, Get, HttpCode, HttpStatus, Param, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { OptionalJwtAuthGuard } from '../../auth/guards/optional-jwt-auth.guard';
import { CurrentUser, OptionalUser } from '../../../common/decorators/current-user.decorator';
import { AuthUser } from '../../../common/interfaces/authenticated-request.interface';
import { AdListingService } from '../services/ad-listing.service';
import { AdService } from '../services/ad.service';
import { ListAdsQueryDto } from '../dto/list-ads-query.dto';
import { AdPageResponse, AdResponse, presentAd, presentAdPage } from '../presenters/ad.presenters';

@ApiTags('ads')
@Controller('ads')
export class AdsController {
  constructor(
    private readonly adListingService: AdListingService,
    private readonly adService: AdService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Browse active ads',
    description: 'Premium listings come first unless an explicit ordering is requested',
  })
  @ApiResponse({ status: 200, description: 'One page of matching ads' })
  @ApiResponse({ status: 400, description: 'Invalid filter values' })
  async listAds(@Query() query: ListAdsQueryDto): Promise<AdPageResponse> {
    return presentAdPage(await this.adListingService.listAds(query));
  }

  @Get('mine')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: "List the caller's ads" })
  @ApiResponse({ status: 200, description: 'All ads except deleted ones, newest first' })
  async listMyAds(@CurrentUser() user: AuthUser): Promise<AdResponse[]> {
    const ads = await this.adListingService.listSellerAds(user.id);
    return ads.map((ad) => presentAd(ad));
  }

  @Get(':slug')
  @UseGuards(OptionalJwtAuthGuard)
  @ApiOperation({ summary: 'Ad detail', description: "Counts a view unless the caller is the ad's seller" })
  @ApiResponse({ status: 200, description: 'The ad' })
  @ApiResponse({ status: 404, description: 'Ad not found' })
  async getAd(@Param('slug') slug: string, @OptionalUser() user?: AuthUser): Promise<AdResponse> {
    return presentAd(await this.adService.viewAd(slug, user?.id));
  }

  @Post(':slug/mark-sold')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: "Mark one of the caller's ads as sold" })
  @ApiResponse({ status: 400, description: 'Ad is already sold' })
  @ApiResponse({ status: 404, description: 'Ad not found' })
  async markSold(
    @CurrentUser() user: AuthUser,
    @Param('slug') slug: string,
  ): Promise<{ message: string; ad: AdResponse }> {
    const ad = await this.adService.markSold(slug, user.id);
    return { message: 'Ad marked as sold.', ad: presentAd(ad) };
  }

  @Post(':slug/reactivate')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Put an expired or sold ad back on the market' })
  @ApiResponse({ status: 400, description: 'Ad is neither expired nor sold' })
  @ApiResponse({ status: 404, description: 'Ad not found' })
  async reactivate(
    @CurrentUser() user: AuthUser,
    @Param('slug') slug: string,
  ): Promise<{ message: string; ad: AdResponse }> {
    const ad = await this.adService.reactivate(slug, user.id);
    return { message: 'Ad reactivated successfully.', ad: presentAd(ad) };
  }

  @Post(':slug/contact')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Record that the caller contacted the seller' })
  @ApiResponse({ status: 400, description: 'Caller is the seller' })
  @ApiResponse({ status: 404, description: 'No active ad with this slug' })
  async recordContact(
    @CurrentUser() user: AuthUser,
    @Param('slug') slug: string,
  ): Promise<{ message: string; contact_count: number }> {
    const ad = await this.adService.recordContact(slug, user.id);
    return { message: 'Contact tracked.', contact_count: ad.contactCount };
  }
}
