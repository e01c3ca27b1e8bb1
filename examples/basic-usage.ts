import { AttributeMapping } from '../src/index.js';

const data = {
  id: '1',
  name: 'first',
  metadata: {
    system: {
      size: 10.7,
      height: 11,
    },
    user: {
      batch: 1121,
    },
  },
};

// load from a mapping
const fromMapping = AttributeMapping.fromMapping(data);

// load from entries
const fromEntries = new AttributeMapping({ name: 'my' });

// nested values resolve by name
console.log(fromMapping.height);
console.log(fromEntries.height);
