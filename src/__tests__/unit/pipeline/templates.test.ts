import { describe, it, expect, afterEach } from '@jest/globals';
import { join } from 'node:path';
import { findTemplatesDir, loadTemplate, resolveTemplatePath } from '../../../core/pipeline/templates.js';
import { ConfigError } from '../../../core/errors.js';
import { createTempSite } from '../../helpers/test-context.js';

describe('Templates', () => {
  const cleanups: Array<() => void> = [];

  afterEach(() => {
    cleanups.splice(0).forEach((cleanup) => cleanup());
  });

  it('should find the bundled templates directory', () => {
    expect(findTemplatesDir()).toBe(join(process.cwd(), 'templates'));
  });

  it('should return null when no templates directory is above the start', () => {
    const site = createTempSite({ 'index.html': 'hello' });
    cleanups.push(site.cleanup);

    expect(findTemplatesDir(site.dir)).toBeNull();
  });

  it('should resolve each variant to its bundled file', () => {
    expect(resolveTemplatePath({ variant: 'website' })).toBe(join(process.cwd(), 'templates', 'website-framework.yaml'));
    expect(resolveTemplatePath({ variant: 'contact-form' })).toBe(
      join(process.cwd(), 'templates', 'website-contact-form.yaml')
    );
  });

  it('should load the bundled website template', async () => {
    const template = await loadTemplate({ variant: 'website' });

    expect(template.body).toContain('AWS::CloudFront::Distribution');
    expect(template.body).toContain('ACMCertificateArn');
  });

  it('should load the bundled contact form template', async () => {
    const template = await loadTemplate({ variant: 'contact-form' });

    expect(template.body).toContain('ContactFormApiUrl');
    expect(template.body).toContain('KmsKeyId');
  });

  it('should prefer an explicit template path', async () => {
    const site = createTempSite({ 'custom.yaml': 'Resources: {}\n' });
    cleanups.push(site.cleanup);

    const template = await loadTemplate({ variant: 'website', path: join(site.dir, 'custom.yaml') });

    expect(template).toEqual({ path: join(site.dir, 'custom.yaml'), body: 'Resources: {}\n' });
  });

  it('should reject a missing or empty template', async () => {
    const site = createTempSite({ 'empty.yaml': '  \n' });
    cleanups.push(site.cleanup);

    await expect(loadTemplate({ variant: 'website', path: join(site.dir, 'missing.yaml') })).rejects.toThrow(
      `Cannot read CloudFormation template ${join(site.dir, 'missing.yaml')}`
    );
    await expect(loadTemplate({ variant: 'website', path: join(site.dir, 'empty.yaml') })).rejects.toBeInstanceOf(
      ConfigError
    );
  });
});
