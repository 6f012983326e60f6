import { createRequire } from 'node:module';
import { defineConfig } from 'vitepress';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version?: string };
const versionLabel = pkg.version ? `v${pkg.version}` : 'v?';

// https://vitepress.dev/reference/site-config
export default defineConfig({
  title: 'aep-registry',
  description:
    'Typed client for the Adobe Experience Platform Schema Registry with error-first results and zod validation.',
  base: process.env.DOCS_BASE ?? '/',
  appearance: 'force-dark',
  markdown: {
    theme: 'one-dark-pro',
  },
  themeConfig: {
    search: {
      provider: 'local',
    },
    // https://vitepress.dev/reference/default-theme-config
    nav: [
      { text: 'Guide', link: '/guide/getting-started' },
      { text: 'Tutorials', link: '/tutorials/find' },
      { text: 'Reference', link: '/reference/options' },
      { text: versionLabel, link: '/guide/getting-started' },
    ],
    sidebar: {
      '/guide/': [
        {
          text: 'Guide',
          items: [
            { text: 'Getting Started', link: '/guide/getting-started' },
            { text: 'Credentials', link: '/guide/credentials' },
            { text: 'Error Handling', link: '/guide/errors' },
          ],
        },
      ],
      '/tutorials/': [
        {
          text: 'Tutorials',
          items: [
            { text: 'Finding resources', link: '/tutorials/find' },
            { text: 'Getting a resource', link: '/tutorials/get' },
            { text: 'Creating resources', link: '/tutorials/create' },
            { text: 'Deleting resources', link: '/tutorials/delete' },
          ],
        },
      ],
      '/reference/': [
        {
          text: 'Reference',
          items: [
            { text: 'Options', link: '/reference/options' },
            { text: 'Entrypoints', link: '/reference/entrypoints' },
          ],
        },
      ],
    },
  },
});
