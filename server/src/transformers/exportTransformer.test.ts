import {
  PlaceExportRow,
  PLACE_EXPORT_COLUMNS,
  REVIEW_EXPORT_COLUMNS,
  toCsv,
  toPlaceExportRow,
  toPlaceExportRows,
  toReviewExportRow,
  toReviewExportRows,
} from './exportTransformer';
import { aggregate } from '../services/aggregationEngine';
import { place, review, utc } from '../test/fixtures';

describe('exportTransformer', () => {
  const joes = place('P1', { name: 'Joe\'s "Best", Pizza', distanceMiles: 1.23456 });
  const reviews = [
    review('P1', { rating: 5, sentiment: 'Positive' }),
    review('P1', { rating: 4, sentiment: 'Positive' }),
    review('P1', { rating: 4, sentiment: 'Positive' }),
  ];

  describe('toPlaceExportRow', () => {
    it('flattens an analytic row with rounded numbers', () => {
      const [row] = aggregate([joes], reviews);

      expect(toPlaceExportRow(row)).toEqual({
        place_id: 'P1',
        name: 'Joe\'s "Best", Pizza',
        address: 'P1 address',
        lat: 33.0198,
        lon: -96.6989,
        distance_miles: 1.23,
        review_count: 3,
        mean_rating: 4.33,
        positive_count: 3,
        neutral_count: 0,
        negative_count: 0,
        high_negative_flag: false,
      });
    });

    it('leaves the mean empty for a place without reviews', () => {
      const [row] = aggregate([place('P2')], []);
      expect(toPlaceExportRow(row).mean_rating).toBeNull();
    });
  });

  describe('toReviewExportRow', () => {
    it('formats the date as UTC and joins issues', () => {
      const row = toReviewExportRow(
        review('P1', {
          rating: 2,
          sentiment: 'Negative',
          issues: ['food', 'service'],
          author: 'bob',
          unixTime: utc(2024, 1, 20, 13, 5, 9),
          text: 'Cold fries, rude staff',
        }),
      );

      expect(row).toEqual({
        place_id: 'P1',
        place_name: 'Place P1',
        store_address: 'P1 address',
        store_city: 'Plano',
        store_state: 'TX',
        store_zip: '75024',
        author: 'bob',
        rating: 2,
        sentiment: 'Negative',
        issues: 'food;service',
        review_time_unix: utc(2024, 1, 20, 13, 5, 9),
        date_utc: '2024-01-20 13:05:09',
        comment: 'Cold fries, rude staff',
      });
    });

    it('leaves the date empty for an undated review', () => {
      expect(toReviewExportRow(review('P1', { rating: 3, sentiment: 'Neutral' })).date_utc).toBeNull();
    });
  });

  describe('toCsv', () => {
    it('writes a header, quotes where needed and ends every line with CRLF', () => {
      const csv = toCsv(toPlaceExportRows(aggregate([joes, place('P2')], reviews)), PLACE_EXPORT_COLUMNS);

      expect(csv.split('\r\n')).toEqual([
        'place_id,name,address,lat,lon,distance_miles,review_count,mean_rating,positive_count,neutral_count,negative_count,high_negative_flag',
        'P1,"Joe\'s ""Best"", Pizza",P1 address,33.0198,-96.6989,1.23,3,4.33,3,0,0,false',
        'P2,Place P2,P2 address,33.0198,-96.6989,0,0,,0,0,0,false',
        '',
      ]);
    });

    it('quotes line breaks inside a comment', () => {
      const csv = toCsv(
        toReviewExportRows([review('P1', { rating: 1, sentiment: 'Negative', author: null, text: 'Never\nagain' })]),
        REVIEW_EXPORT_COLUMNS,
      );

      expect(csv).toBe(
        'place_id,place_name,store_address,store_city,store_state,store_zip,author,rating,sentiment,issues,review_time_unix,date_utc,comment\r\n' +
          'P1,Place P1,P1 address,Plano,TX,75024,,1,Negative,,,,"Never\nagain"\r\n',
      );
    });

    it('writes only the header for no rows', () => {
      expect(toCsv<PlaceExportRow>([], PLACE_EXPORT_COLUMNS)).toBe(`${PLACE_EXPORT_COLUMNS.join(',')}\r\n`);
    });
  });
});
