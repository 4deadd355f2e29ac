import { runAllTests } from './tests';

runAllTests()
  .then(() => {
    console.log('Simulation tests passed');
  })
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
