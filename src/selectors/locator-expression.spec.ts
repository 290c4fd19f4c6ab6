import { InvalidArgumentError, InvalidLocatorError } from '../common/errors';
import { By, LocatorExpression } from './locator-expression';

describe('LocatorExpression', () => {
  describe('from', () => {
    it('should resolve an id to an XPath attribute match', () => {
      const locator = By.id('login');

      expect(locator.kind).toBe('id');
      expect(locator.family).toBe('xpath');
      expect(locator.selector).toBe("xpath=//*[@id='login']");
    });

    it('should resolve a name to an XPath attribute match', () => {
      expect(By.name('email').query).toBe("//*[@name='email']");
    });

    it('should match a class name as a whole token', () => {
      expect(By.className('btn').query).toBe(
        "//*[contains(concat(' ', normalize-space(@class), ' '), ' btn ')]",
      );
    });

    it('should reject compound class names', () => {
      expect(() => By.className('btn primary')).toThrow(InvalidLocatorError);
    });

    it('should resolve a tag name', () => {
      expect(By.tagName('td').query).toBe('//td');
    });

    it('should reject tag names that are not identifiers', () => {
      expect(() => By.tagName('1td')).toThrow('Invalid tag name: "1td"');
    });

    it('should keep raw XPath and CSS queries', () => {
      expect(By.xpath(' //table/tbody ').selector).toBe('xpath=//table/tbody');
      expect(By.cssSelector('ul > li.item').selector).toBe('css=ul > li.item');
    });

    it('should match link text after normalizing its whitespace', () => {
      expect(By.linkText('  Next \n page ').query).toBe("//a[normalize-space(.)='Next page']");
    });

    it('should escape apostrophes in partial link text', () => {
      expect(By.partialLinkText("O'Neil").query).toBe(
        `//a[contains(normalize-space(.), "O'Neil")]`,
      );
    });

    it('should reject blank values', () => {
      expect(() => By.xpath('   ')).toThrow(InvalidLocatorError);
      expect(() => By.id('')).toThrow('Cannot build a id locator from a blank value');
    });
  });

  describe('chain', () => {
    it('should concatenate XPath queries', () => {
      const chained = LocatorExpression.chain(By.xpath('//table'), By.xpath('/tbody'), By.xpath('/tr'));

      expect(chained.kind).toBe('chain');
      expect(chained.selector).toBe('xpath=//table/tbody/tr');
    });

    it('should chain CSS queries with >>', () => {
      const chained = LocatorExpression.chain(By.cssSelector('table'), By.cssSelector('tbody tr'));

      expect(chained.selector).toBe('css=table >> tbody tr');
    });

    it('should keep a positional CSS part scoped when chaining after it', () => {
      const link = LocatorExpression.chain(By.cssSelector('li').nth(0), By.cssSelector('a'));

      expect(link.selector).toBe('css=li >> nth=0 >> a');
      expect(link.nth(1).selector).toBe('css=li >> nth=0 >> a >> nth=1');
    });

    it('should return a single locator unchanged', () => {
      const locator = By.id('users');

      expect(LocatorExpression.chain(locator)).toBe(locator);
    });

    it('should reject mixed families', () => {
      expect(() => LocatorExpression.chain(By.xpath('//table'), By.cssSelector('tbody'))).toThrow(
        'Cannot chain css locator "tbody" onto xpath locators',
      );
    });

    it('should reject an empty list', () => {
      expect(() => LocatorExpression.chain()).toThrow(InvalidLocatorError);
    });
  });

  describe('nth', () => {
    it('should wrap XPath queries in a 1-based position', () => {
      expect(By.xpath('//tr').nth(2).selector).toBe('xpath=(//tr)[3]');
    });

    it('should use the nth selector engine for CSS queries', () => {
      expect(By.cssSelector('li').nth(0).selector).toBe('css=li >> nth=0');
    });

    it('should compose with chain', () => {
      const cells = LocatorExpression.chain(By.xpath('//tr').nth(0), By.xpath('/td'));

      expect(cells.nth(1).query).toBe('((//tr)[1]/td)[2]');
    });

    it('should reject negative and fractional indices', () => {
      expect(() => By.xpath('//tr').nth(-1)).toThrow(InvalidArgumentError);
      expect(() => By.xpath('//tr').nth(1.5)).toThrow(InvalidArgumentError);
    });
  });

  it('should print as its selector', () => {
    expect(`${By.cssSelector('a')}`).toBe('css=a');
  });
});
